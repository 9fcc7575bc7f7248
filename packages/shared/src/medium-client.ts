import { promises as fs } from 'fs';
import path from 'path';
import type { z } from 'zod';
import {
  DataEnvelopeSchema,
  MediumErrorBodySchema,
  MediumUserSchema,
  PublishedPostSchema,
  UploadedImageSchema,
  type MediumConfig,
  type MediumUser,
  type PostRequest,
  type PublishedPost,
  type UploadedImage,
} from './types.js';
import { fail, ok, type Result } from './result.js';

export interface MediumClientOptions {
  /** Replaces the global fetch, mainly for tests */
  fetch?: typeof fetch;
}

const IMAGE_CONTENT_TYPES: Record<string, string> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  tif: 'image/tiff',
  tiff: 'image/tiff',
  webp: 'image/webp',
  svg: 'image/svg+xml',
};

export function imageContentType(filePath: string): string {
  const extension = path.extname(filePath).slice(1).toLowerCase();
  return IMAGE_CONTENT_TYPES[extension] ?? `image/${extension}`;
}

/**
 * Thin wrapper over the Medium REST API.
 *
 * HTTP outcomes come back as a Result. Timeouts and network errors are thrown.
 */
export class MediumClient {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly config: MediumConfig,
    options: MediumClientOptions = {}
  ) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Headers sent with every request. The browser-like values keep naive bot
   * filters in front of the API from rejecting the call.
   */
  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.config.token}`,
      Accept: 'application/json,text/html,application/xhtml+xml,*/*;q=0.8',
      'Accept-Charset': 'utf-8',
      'Accept-Language': 'en-US,en;q=0.5',
      'User-Agent':
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:109.0) Gecko/20100101 Firefox/120.0',
    };
  }

  private async request(
    endpoint: string,
    init: { method: 'GET' | 'POST'; body?: string | FormData; json?: boolean }
  ): Promise<Response> {
    const headers = this.headers();
    if (init.json) headers['Content-Type'] = 'application/json';

    return this.fetchImpl(`${this.config.baseUrl}${endpoint}`, {
      method: init.method,
      headers,
      body: init.body,
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });
  }

  /**
   * Turn a response into a Result, validating the `data` envelope on success
   */
  private async readResponse<T>(
    response: Response,
    acceptedStatuses: number[],
    schema: z.ZodType<T>,
    action: string
  ): Promise<Result<T>> {
    const text = await response.text();

    if (!acceptedStatuses.includes(response.status)) {
      return fail(`${action} failed with HTTP ${response.status}${describeErrorBody(text)}`);
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      return fail(`${action} returned a body that is not JSON`);
    }

    const envelope = DataEnvelopeSchema.safeParse(body);
    const parsed = schema.safeParse(envelope.success ? envelope.data.data : undefined);
    if (!parsed.success) {
      return fail(`${action} returned an unexpected body: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    return ok(parsed.data);
  }

  /**
   * Profile of the user the token belongs to
   */
  async getProfile(): Promise<Result<MediumUser>> {
    const response = await this.request('/me', { method: 'GET' });
    return this.readResponse(response, [200], MediumUserSchema, 'Author lookup');
  }

  async getAuthorId(): Promise<Result<string>> {
    const profile = await this.getProfile();
    return profile.ok ? ok(profile.value.id) : profile;
  }

  /**
   * Upload a local image to Medium's CDN
   */
  async uploadImage(filePath: string): Promise<Result<UploadedImage>> {
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(filePath);
    } catch (error) {
      return fail(`Cannot read image "${filePath}": ${error instanceof Error ? error.message : String(error)}`);
    }

    const form = new FormData();
    form.append(
      'image',
      new Blob([new Uint8Array(bytes)], { type: imageContentType(filePath) }),
      path.basename(filePath)
    );

    const response = await this.request('/images', { method: 'POST', body: form });
    return this.readResponse(response, [200, 201], UploadedImageSchema, 'Image upload');
  }

  /**
   * Create a post under the given author
   */
  async createPost(authorId: string, post: PostRequest): Promise<Result<PublishedPost>> {
    const response = await this.request(`/users/${encodeURIComponent(authorId)}/posts`, {
      method: 'POST',
      body: JSON.stringify(post),
      json: true,
    });
    return this.readResponse(response, [200, 201], PublishedPostSchema, 'Post creation');
  }
}

function describeErrorBody(text: string): string {
  try {
    const parsed = MediumErrorBodySchema.safeParse(JSON.parse(text));
    return parsed.success ? `: ${parsed.data.errors[0].message}` : '';
  } catch {
    return '';
  }
}
