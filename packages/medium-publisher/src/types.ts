import { z } from 'zod';
import type { PostRequest, PublishStatus } from '@mdpub/shared';

/**
 * Front-matter recognised in a post. Unknown keys are kept as they are.
 * An empty YAML value (`title:`) parses as null and counts as absent.
 */
export const PostFrontMatterSchema = z
  .object({
    title: z
      .union([z.string(), z.number()])
      .transform(value => String(value).trim())
      .nullish(),
    tags: z
      .union([z.string().transform(tag => [tag]), z.array(z.string())])
      .nullish(),
    description: z.string().nullish(),
    image: z.string().nullish(),
  })
  .passthrough();

export type PostFrontMatter = z.infer<typeof PostFrontMatterSchema>;

/**
 * Parsed markdown post
 */
export interface ParsedPost {
  metadata: PostFrontMatter;
  body: string;
  originalPath: string;
}

/**
 * Publishing options
 */
export interface PublishingOptions {
  publishStatus?: PublishStatus;
  /** Append the author footer to the content */
  includeFooter?: boolean;
  footerPath?: string;
  /** Build the payload only, no API calls */
  dryRun?: boolean;
}

/**
 * Image handling summary for one post
 */
export interface ImageStats {
  /** Image references in the content, duplicates included */
  found: number;
  /** Distinct local sources that now point at Medium's CDN */
  uploaded: number;
  failed: number;
  /** Remote references, left as they are */
  skipped: number;
}

/**
 * Publishing result
 */
export interface PublishingResult {
  success: boolean;
  path: string;
  title?: string;
  url?: string;
  postId?: string;
  payload?: PostRequest;
  images: ImageStats;
  error?: string;
  warnings?: string[];
}

/**
 * Batch publishing result
 */
export interface BatchPublishingResult {
  total: number;
  successful: number;
  failed: number;
  results: PublishingResult[];
  errors: string[];
}
