/**
 * Medium Publisher - publishes markdown posts, and the local images they
 * reference, to Medium.
 */

export { ContentPublisher, MAX_RECOMMENDED_TAGS, type MediumApi } from './content-publisher.js';
export { MarkdownParser } from './markdown-parser.js';
export { FileManager, DEFAULT_FOOTER_PATH } from './file-manager.js';
export { buildPostRequest, normalizeTag, normalizeTags, type PayloadInput } from './payload-builder.js';
export {
  extractImages,
  isLocalImage,
  renderMarkdown,
  resolveImagePath,
  substituteImages,
} from './image-extractor.js';
export { createProgram, runPublisher, type CliOptions, type CliDependencies } from './cli.js';
export { Logger } from './utils/logger.js';

export type {
  PostFrontMatter,
  ParsedPost,
  PublishingOptions,
  PublishingResult,
  BatchPublishingResult,
  ImageStats,
} from './types.js';

// Re-export from shared package for convenience
export { MediumClient, loadConfig } from '@mdpub/shared';
