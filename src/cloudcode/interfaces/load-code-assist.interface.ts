export interface ClientMetadata {
  ideType: string;
  platform: string;
  pluginType: string;
  duetProject?: string;
}

export interface Tier {
  id: string;
  name?: string;
  description?: string;
  userDefinedCloudaicompanionProject?: boolean;
  isDefault?: boolean;
}

export interface LoadCodeAssistResponse {
  currentTier?: Tier;
  allowedTiers?: Tier[];
  cloudaicompanionProject?: string;
  gcpManaged?: boolean;
  manageSubscriptionUri?: string;
}

export interface OnboardUserRequest {
  tierId: string;
  cloudaicompanionProject: string;
  metadata: ClientMetadata;
}

/**
 * Long-running operation handle returned by `onboardUser`.
 */
export interface OnboardUserOperation {
  name?: string;
  done?: boolean;
  response?: {
    cloudaicompanionProject?: {
      id?: string;
      name?: string;
    };
  };
}
