import { Command, Option } from 'commander';
import { z } from 'zod';
import {
  DEFAULT_CONFIG_PATH,
  loadConfig,
  MediumClient,
  PUBLISH_STATUSES,
  PublishStatusSchema,
  type LoadConfigOptions,
  type MediumConfig,
} from '@mdpub/shared';
import { ContentPublisher, type MediumApi } from './content-publisher.js';
import { DEFAULT_FOOTER_PATH, FileManager } from './file-manager.js';
import { Logger } from './utils/logger.js';
import type { PublishingOptions } from './types.js';

export const CliOptionsSchema = z.object({
  post: z.string().optional(),
  list: z.string().optional(),
  status: PublishStatusSchema,
  author: z.boolean(),
  footer: z.string(),
  config: z.string(),
  dryRun: z.boolean(),
  json: z.boolean(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export interface CliDependencies {
  loadConfig?: (options: LoadConfigOptions) => Promise<MediumConfig>;
  createClient?: (config: MediumConfig) => MediumApi;
  logger?: Logger;
  fileManager?: FileManager;
  setExitCode?: (code: number) => void;
}

/**
 * Load the config, then publish a single post or every post in a list file.
 * Resolves to the process exit code.
 */
export async function runPublisher(options: CliOptions, deps: CliDependencies = {}): Promise<number> {
  const logger = deps.logger ?? new Logger(options.json);
  const fileManager = deps.fileManager ?? new FileManager();

  let config: MediumConfig;
  try {
    config = await (deps.loadConfig ?? loadConfig)({ configPath: options.config });
  } catch (error) {
    logger.error('Medium Token not found...', {
      reason: error instanceof Error ? error.message : String(error),
    });
    return 1;
  }

  const createClient = deps.createClient ?? ((medium: MediumConfig) => new MediumClient(medium));
  const publisher = new ContentPublisher({ client: createClient(config), logger, fileManager });

  const publishOptions: PublishingOptions = {
    publishStatus: options.status,
    includeFooter: options.author,
    footerPath: options.footer,
    dryRun: options.dryRun,
  };

  if (options.post !== undefined) {
    const result = await publisher.publishArticle(options.post, publishOptions);
    return result.success ? 0 : 1;
  }

  if (options.list === undefined) {
    logger.error('One of --post or --list is required');
    return 1;
  }

  let markdownPaths: string[];
  try {
    markdownPaths = await fileManager.readPathList(options.list);
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  if (markdownPaths.length === 0) {
    logger.warn(`No markdown paths found in ${options.list}`);
    return 0;
  }

  const batchResult = await publisher.batchPublish(markdownPaths, publishOptions);

  logger.info('Batch publishing results', {
    successful: batchResult.successful,
    failed: batchResult.failed,
    total: batchResult.total,
  });
  for (const error of batchResult.errors) {
    logger.error(error);
  }

  return batchResult.failed > 0 ? 1 : 0;
}

/**
 * Command line definition
 */
export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command();
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  program
    .name('mdpub')
    .description('Publish markdown files, with their local images, to Medium')
    .version('0.1.0')
    .addOption(new Option('-p, --post <path>', 'markdown file to publish').conflicts('list'))
    .addOption(new Option('-l, --list <path>', 'file listing markdown paths, one per line'))
    .addOption(
      new Option('-s, --status <status>', 'publish status of the created post')
        .choices(PUBLISH_STATUSES)
        .default('draft')
    )
    .option('-a, --author', 'append the author footer to every post', false)
    .option('--footer <path>', 'author footer markdown file', DEFAULT_FOOTER_PATH)
    .option('-c, --config <path>', 'dotenv file holding MEDIUM_AUTH_TOKEN', DEFAULT_CONFIG_PATH)
    .option('--dry-run', 'build the post without calling Medium', false)
    .option('--json', 'output structured JSON logs', false)
    .action(async (rawOptions: unknown) => {
      const options = CliOptionsSchema.parse(rawOptions);

      if (options.post === undefined && options.list === undefined) {
        program.error("error: one of '-p, --post <path>' or '-l, --list <path>' is required", {
          code: 'mdpub.missingInput',
        });
      }

      const code = await runPublisher(options, deps);
      if (code !== 0) setExitCode(code);
    });

  return program;
}
