/**
 * Vertex AI Endpoints
 * upstream URL 皆由啟動時已知的 project / location / endpoint 組成
 */

export interface VertexEndpointOptions {
  projectId: string;
  location: string;
  endpointId: string;
  /** 覆寫 upstream 主機（預設 https://{location}-aiplatform.googleapis.com） */
  baseUrl?: string;
}

export class VertexEndpoints {
  readonly projectId: string;
  readonly location: string;
  readonly endpointId: string;
  readonly baseUrl: string;

  constructor(options: VertexEndpointOptions) {
    this.projectId = options.projectId;
    this.location = options.location;
    this.endpointId = options.endpointId;
    this.baseUrl = (options.baseUrl ?? `https://${options.location}-aiplatform.googleapis.com`)
      .replace(/\/+$/, '');
  }

  /**
   * OpenAI 相容的 chat completions 端點；query 原樣附加
   */
  chatCompletions(query = ''): string {
    const target =
      `${this.baseUrl}/v1` +
      `/projects/${encodeURIComponent(this.projectId)}` +
      `/locations/${encodeURIComponent(this.location)}` +
      `/endpoints/${encodeURIComponent(this.endpointId)}` +
      '/chat/completions';
    return query ? `${target}?${query}` : target;
  }

  /**
   * 單一 publisher 的模型清單
   */
  publisherModels(publisher: string): string {
    return `${this.baseUrl}/v1beta1/publishers/${encodeURIComponent(publisher)}/models`;
  }
}
