import type { MediumClient } from '@mdpub/shared';
import { MarkdownParser } from './markdown-parser.js';
import { FileManager } from './file-manager.js';
import { buildPostRequest } from './payload-builder.js';
import { extractImages, isLocalImage, resolveImagePath, substituteImages } from './image-extractor.js';
import { Logger } from './utils/logger.js';
import type {
  BatchPublishingResult,
  ImageStats,
  PublishingOptions,
  PublishingResult,
} from './types.js';

/** Medium accepts more, but only the first few tags are shown */
export const MAX_RECOMMENDED_TAGS = 5;

export type MediumApi = Pick<MediumClient, 'getAuthorId' | 'uploadImage' | 'createPost'>;

export interface ContentPublisherOptions {
  client: MediumApi;
  logger?: Logger;
  parser?: MarkdownParser;
  fileManager?: FileManager;
}

/**
 * Runs the publishing workflow for one markdown file at a time
 */
export class ContentPublisher {
  private client: MediumApi;
  private logger: Logger;
  private markdownParser: MarkdownParser;
  private fileManager: FileManager;

  constructor(options: ContentPublisherOptions) {
    this.client = options.client;
    this.logger = options.logger ?? new Logger();
    this.markdownParser = options.parser ?? new MarkdownParser();
    this.fileManager = options.fileManager ?? new FileManager();
  }

  /**
   * Publish a single article.
   *
   * Never throws: parse errors, timeouts and API failures all come back as
   * `{ success: false }` so that a batch can carry on with the next file.
   */
  async publishArticle(
    markdownPath: string,
    options: PublishingOptions = {}
  ): Promise<PublishingResult> {
    const images: ImageStats = { found: 0, uploaded: 0, failed: 0, skipped: 0 };
    const warnings: string[] = [];

    const failure = (error: string, title?: string): PublishingResult => {
      this.logger.error(`Error: Failed to post article "${markdownPath}": ${error}`);
      return { success: false, path: markdownPath, title, images, error, warnings };
    };

    try {
      this.logger.info(`Reading file content: ${markdownPath}`);
      const post = await this.markdownParser.parseFile(markdownPath);

      const footer = options.includeFooter
        ? await this.fileManager.readFooter(options.footerPath)
        : undefined;

      const payload = buildPostRequest({
        metadata: post.metadata,
        body: post.body,
        filePath: markdownPath,
        publishStatus: options.publishStatus ?? 'draft',
        footer,
      });
      this.logger.info('Processing post content...', { title: payload.title });

      if (payload.tags && payload.tags.length > MAX_RECOMMENDED_TAGS) {
        const warning = `Post has ${payload.tags.length} tags, Medium recommends at most ${MAX_RECOMMENDED_TAGS}`;
        warnings.push(warning);
        this.logger.warn(warning);
      }

      const sources = extractImages(payload.content);
      const localSources = sources.filter(isLocalImage);
      images.found = sources.length;
      images.skipped = sources.length - localSources.length;
      const pending = Array.from(new Set(localSources));
      this.logger.info(`Found ${pending.length} image(s) to upload...`);

      if (options.dryRun) {
        this.logger.info('Dry run, nothing was sent to Medium', { payload, images: pending });
        return { success: true, path: markdownPath, title: payload.title, payload, images, warnings };
      }

      // Upload in document order, then rewrite every reference in one pass
      const realPath = await this.fileManager.realPath(markdownPath);
      const uploaded = new Map<string, string>();
      for (const source of pending) {
        const result = await this.client.uploadImage(resolveImagePath(source, realPath));
        if (result.ok) {
          uploaded.set(source, result.value.url);
          images.uploaded++;
          this.logger.info(`Image: ${source} -> ${result.value.url}`);
        } else {
          images.failed++;
          const warning = `Image "${source}" kept as a local path: ${result.reason}`;
          warnings.push(warning);
          this.logger.warn(warning);
        }
      }

      const request = { ...payload, content: substituteImages(payload.content, uploaded) };

      const authorId = await this.client.getAuthorId();
      if (!authorId.ok) {
        return failure(authorId.reason, payload.title);
      }
      this.logger.info(`Author lookup: ${authorId.value}`);

      const published = await this.client.createPost(authorId.value, request);
      if (!published.ok) {
        return failure(published.reason, payload.title);
      }

      this.logger.info(`Post created: ${published.value.id}`, { publishStatus: request.publishStatus });
      this.logger.success(published.value.url);

      return {
        success: true,
        path: markdownPath,
        title: payload.title,
        url: published.value.url,
        postId: published.value.id,
        payload: request,
        images,
        warnings,
      };
    } catch (error) {
      return failure(error instanceof Error ? error.message : 'Unknown error');
    }
  }

  /**
   * Publish multiple articles, one after another, in the given order
   */
  async batchPublish(
    markdownPaths: string[],
    options: PublishingOptions = {}
  ): Promise<BatchPublishingResult> {
    this.logger.info(`Starting batch publish of ${markdownPaths.length} articles`);

    const results: PublishingResult[] = [];
    const errors: string[] = [];
    let successful = 0;
    let failed = 0;

    for (const markdownPath of markdownPaths) {
      const result = await this.publishArticle(markdownPath, options);
      results.push(result);

      if (result.success) {
        successful++;
      } else {
        failed++;
        errors.push(`${markdownPath}: ${result.error ?? 'Unknown error'}`);
      }
    }

    this.logger.info(`Batch publish completed: ${successful} successful, ${failed} failed`);

    return {
      total: markdownPaths.length,
      successful,
      failed,
      results,
      errors,
    };
  }
}
