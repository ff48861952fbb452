import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setTimeout as sleep } from 'timers/promises';
import {
  CLIENT_METADATA,
  DEFAULT_TIER_ID,
  ONBOARD_PLACEHOLDER_PROJECT,
} from '../cloudcode/constants';
import {
  LoadCodeAssistResponse,
  OnboardUserOperation,
  OnboardUserRequest,
} from '../cloudcode/interfaces';
import {
  UpstreamCallOptions,
  UpstreamClientService,
} from '../cloudcode/services/upstream-client.service';
import { OnboardingIncompleteError } from '../common/errors';

interface PendingResolution {
  promise: Promise<string>;
  controller: AbortController;
  /** Callers still waiting that could abort; `Infinity` once one cannot. */
  waiters: number;
}

/**
 * Resolves the project id attached to every CloudCode request: the
 * configured override, the account's companion project, or the result of
 * onboarding the account.
 */
@Injectable()
export class ProjectService {
  private readonly logger = new Logger(ProjectService.name);
  private resolvedProjectId: string | null = null;
  private pending: PendingResolution | null = null;
  private loadResponse: LoadCodeAssistResponse | null = null;

  constructor(
    private readonly upstream: UpstreamClientService,
    private readonly configService: ConfigService,
  ) {}

  async resolveProjectId(options: UpstreamCallOptions = {}): Promise<string> {
    const override = this.configService.get<string>('cloudcode.projectId');
    if (override) {
      return override;
    }

    if (this.resolvedProjectId) {
      return this.resolvedProjectId;
    }

    if (!this.pending) {
      this.pending = this.startResolution();
    }
    return this.join(this.pending, options.signal);
  }

  private startResolution(): PendingResolution {
    const controller = new AbortController();
    const pending: PendingResolution = {
      controller,
      waiters: 0,
      promise: this.discoverProjectId({ signal: controller.signal })
        .then((projectId) => {
          this.resolvedProjectId = projectId;
          return projectId;
        })
        .finally(() => {
          if (this.pending === pending) this.pending = null;
        }),
    };
    return pending;
  }

  /**
   * Waits on the shared resolution. A caller whose signal aborts stops
   * waiting on its own; the resolution itself is aborted only once every
   * caller that can abort has left.
   */
  private join(
    pending: PendingResolution,
    signal: AbortSignal | undefined,
  ): Promise<string> {
    if (!signal) {
      pending.waiters = Infinity;
      return pending.promise;
    }

    pending.waiters++;
    return new Promise<string>((resolve, reject) => {
      const onAbort = () => {
        pending.waiters--;
        if (pending.waiters <= 0) {
          if (this.pending === pending) this.pending = null;
          pending.controller.abort(signal.reason);
        }
        reject(signal.reason);
      };

      void pending.promise.then(
        (projectId) => {
          signal.removeEventListener('abort', onAbort);
          resolve(projectId);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        },
      );

      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    });
  }

  async getLoadResponse(
    options: UpstreamCallOptions = {},
  ): Promise<LoadCodeAssistResponse> {
    if (!this.loadResponse) {
      this.loadResponse = await this.upstream.loadCodeAssist(options);
    }
    return this.loadResponse;
  }

  private async discoverProjectId(
    options: UpstreamCallOptions,
  ): Promise<string> {
    const loadResponse = await this.getLoadResponse(options);

    if (loadResponse.gcpManaged !== true) {
      const projectId = loadResponse.cloudaicompanionProject ?? '';
      this.logger.log(
        `Using project ID from loadCodeAssist (gcpManaged=false): ${projectId}`,
      );
      return projectId;
    }

    this.logger.log('gcpManaged=true, starting project onboarding');
    return this.onboard(loadResponse, options);
  }

  private async onboard(
    loadResponse: LoadCodeAssistResponse,
    options: UpstreamCallOptions,
  ): Promise<string> {
    if (loadResponse.cloudaicompanionProject) {
      this.logger.log(
        `Discovered project ID (quick path): ${loadResponse.cloudaicompanionProject}`,
      );
      return loadResponse.cloudaicompanionProject;
    }

    const tierId =
      loadResponse.allowedTiers?.find((tier) => tier.isDefault)?.id ||
      DEFAULT_TIER_ID;
    this.logger.debug(`Selected tier for onboarding: ${tierId}`);

    const request: OnboardUserRequest = {
      tierId,
      cloudaicompanionProject: ONBOARD_PLACEHOLDER_PROJECT,
      metadata: {
        ...CLIENT_METADATA,
        duetProject: ONBOARD_PLACEHOLDER_PROJECT,
      },
    };

    const pollIntervalMs =
      this.configService.get<number>('cloudcode.onboardPollIntervalMs') ?? 2000;
    const startTime = Date.now();
    let pollCount = 0;
    let operation = await this.upstream.onboardUser(request, options);

    while (!operation.done) {
      pollCount++;
      this.logger.debug(
        `Polling onboardUser: attempt=${pollCount}, elapsed=${Date.now() - startTime}ms`,
      );
      await sleep(pollIntervalMs, undefined, { signal: options.signal });
      operation = await this.upstream.onboardUser(request, options);
    }

    return this.extractProjectId(operation, pollCount, startTime);
  }

  private extractProjectId(
    operation: OnboardUserOperation,
    pollCount: number,
    startTime: number,
  ): string {
    const projectId = operation.response?.cloudaicompanionProject?.id;
    if (!projectId) {
      throw new OnboardingIncompleteError();
    }

    this.logger.log(
      `Discovered project ID after onboarding: ${projectId} (polls=${pollCount}, ${Date.now() - startTime}ms)`,
    );
    return projectId;
  }
}
