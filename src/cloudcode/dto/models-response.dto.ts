export interface ModelInfo {
  id: string;
  object: 'model';
  created: number;
  owned_by: string;
  display_name?: string;
}

export interface ModelsResponse {
  object: 'list';
  data: ModelInfo[];
}
