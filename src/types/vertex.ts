/**
 * Vertex AI publisher model（只取用到的欄位）
 */
export interface PublisherModel {
  name?: string;
  versionId?: string;
  launchStage?: string;
}

/**
 * GET /v1beta1/publishers/{publisher}/models
 */
export interface PublisherModelsResponse {
  publisherModels?: PublisherModel[];
  nextPageToken?: string;
}

/**
 * 正規化後的模型項目
 */
export interface ModelEntry {
  /** {publisher}/{model} */
  id: string;
  ownedBy: string;
}

/**
 * OpenAI 相容的模型清單回應
 */
export interface OpenAIModel {
  id: string;
  object: 'model';
  owned_by: string;
}

export interface OpenAIModelList {
  object: 'list';
  data: OpenAIModel[];
}
