import { describe, it, expect } from 'vitest';
import { VertexEndpoints } from '../../src/lib/endpoints.js';

describe('VertexEndpoints', () => {
  const endpoints = new VertexEndpoints({
    projectId: 'my-project',
    location: 'us-central1',
    endpointId: 'openapi',
  });

  it('should derive the regional host from the location', () => {
    expect(endpoints.baseUrl).toBe('https://us-central1-aiplatform.googleapis.com');
  });

  it('should build the chat completions URL', () => {
    expect(endpoints.chatCompletions()).toBe(
      'https://us-central1-aiplatform.googleapis.com/v1/projects/my-project/locations/us-central1/endpoints/openapi/chat/completions'
    );
  });

  it('should append the raw query string verbatim', () => {
    expect(endpoints.chatCompletions('alt=sse&x=a%20b')).toBe(
      'https://us-central1-aiplatform.googleapis.com/v1/projects/my-project/locations/us-central1/endpoints/openapi/chat/completions?alt=sse&x=a%20b'
    );
  });

  it('should build the publisher models URL', () => {
    expect(endpoints.publisherModels('anthropic')).toBe(
      'https://us-central1-aiplatform.googleapis.com/v1beta1/publishers/anthropic/models'
    );
  });

  it('should accept a base URL override without trailing slash', () => {
    const local = new VertexEndpoints({
      projectId: 'p',
      location: 'europe-west4',
      endpointId: 'openapi',
      baseUrl: 'http://127.0.0.1:9999/',
    });
    expect(local.publisherModels('google')).toBe('http://127.0.0.1:9999/v1beta1/publishers/google/models');
  });
});
