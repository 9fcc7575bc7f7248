import { z } from 'zod';

/**
 * Visibility states a Medium post can be created with
 */
export const PUBLISH_STATUSES = ['public', 'unlisted', 'draft'] as const;

export const PublishStatusSchema = z.enum(PUBLISH_STATUSES);

export type PublishStatus = z.infer<typeof PublishStatusSchema>;

/**
 * Body of `POST /users/{authorId}/posts`
 */
export interface PostRequest {
  title: string;
  tags?: string[];
  publishStatus: PublishStatus;
  content: string;
  contentFormat: 'markdown';
}

/**
 * `GET /me` response
 */
export const MediumUserSchema = z.object({
  id: z.string().min(1),
  username: z.string().optional(),
  name: z.string().optional(),
  url: z.string().optional(),
  imageUrl: z.string().optional(),
});

export type MediumUser = z.infer<typeof MediumUserSchema>;

/**
 * `POST /images` response
 */
export const UploadedImageSchema = z.object({
  url: z.string().url(),
  md5: z.string().optional(),
});

export type UploadedImage = z.infer<typeof UploadedImageSchema>;

/**
 * `POST /users/{authorId}/posts` response
 */
export const PublishedPostSchema = z.object({
  id: z.string(),
  url: z.string().url(),
  title: z.string().optional(),
  authorId: z.string().optional(),
  tags: z.array(z.string()).optional(),
  publishStatus: z.string().optional(),
  canonicalUrl: z.string().optional(),
});

export type PublishedPost = z.infer<typeof PublishedPostSchema>;

/**
 * Every successful Medium response wraps its payload in `data`
 */
export const DataEnvelopeSchema = z.object({ data: z.unknown() });

/**
 * Medium error body, e.g. `{ "errors": [{ "message": "Token was invalid.", "code": 6003 }] }`
 */
export const MediumErrorBodySchema = z.object({
  errors: z
    .array(
      z.object({
        message: z.string(),
        code: z.number().optional(),
      })
    )
    .min(1),
});

/**
 * Environment configuration
 */
export const EnvironmentConfigSchema = z.object({
  MEDIUM_AUTH_TOKEN: z.string().trim().min(1),
  MEDIUM_API_BASE_URL: z.string().url().default('https://api.medium.com/v1'),
  MEDIUM_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
});

export type EnvironmentConfig = z.infer<typeof EnvironmentConfigSchema>;

/**
 * Settings the Medium client is constructed with
 */
export interface MediumConfig {
  readonly token: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
}
