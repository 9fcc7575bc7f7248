import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { ensureDir, remove } from 'fs-extra';
import {
  ConfigError,
  fail,
  ok,
  type LoadConfigOptions,
  type MediumConfig,
  type PostRequest,
  type PublishedPost,
  type Result,
  type UploadedImage,
} from '@mdpub/shared';
import { createProgram, runPublisher, type CliOptions } from '../src/cli.js';
import { Logger } from '../src/utils/logger.js';

const config: MediumConfig = {
  token: 'test-token',
  baseUrl: 'https://api.medium.com/v1',
  timeoutMs: 60000,
};

function createClientMock() {
  return {
    getAuthorId: vi.fn<[], Promise<Result<string>>>(),
    uploadImage: vi.fn<[string], Promise<Result<UploadedImage>>>(),
    createPost: vi.fn<[string, PostRequest], Promise<Result<PublishedPost>>>(),
  };
}

describe('cli', () => {
  let testDir: string;
  let client: ReturnType<typeof createClientMock>;
  const loadConfig = vi.fn<[LoadConfigOptions], Promise<MediumConfig>>();
  const createClient = vi.fn((_config: MediumConfig) => client);
  const setExitCode = vi.fn<[number], void>();

  beforeEach(async () => {
    vi.clearAllMocks();
    testDir = path.join(process.cwd(), 'test-output', 'cli');
    await ensureDir(testDir);
    client = createClientMock();
    loadConfig.mockResolvedValue(config);
    client.getAuthorId.mockResolvedValue(ok('author-1'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await remove(testDir);
  });

  function program() {
    return createProgram({ loadConfig, createClient, setExitCode, logger: new Logger() })
      .exitOverride()
      .configureOutput({ writeErr: () => {}, writeOut: () => {} });
  }

  function options(overrides: Partial<CliOptions>): CliOptions {
    return {
      status: 'draft',
      author: false,
      footer: path.join(testDir, 'socials.md'),
      config: path.join(testDir, 'token.config'),
      dryRun: false,
      json: false,
      ...overrides,
    };
  }

  describe('argument parsing', () => {
    it('should reject an unknown publish status before loading config', async () => {
      await expect(
        program().parseAsync(['node', 'mdpub', '--post', 'post.md', '--status', 'published'])
      ).rejects.toMatchObject({ code: 'commander.invalidArgument' });

      expect(loadConfig).not.toHaveBeenCalled();
      expect(createClient).not.toHaveBeenCalled();
    });

    it('should reject --post together with --list', async () => {
      await expect(
        program().parseAsync(['node', 'mdpub', '--post', 'a.md', '--list', 'posts.txt'])
      ).rejects.toMatchObject({ code: 'commander.conflictingOption' });

      expect(loadConfig).not.toHaveBeenCalled();
    });

    it('should require one of --post or --list', async () => {
      await expect(program().parseAsync(['node', 'mdpub'])).rejects.toMatchObject({
        code: 'mdpub.missingInput',
      });

      expect(loadConfig).not.toHaveBeenCalled();
    });

    it('should publish a single post with the requested status', async () => {
      const postPath = path.join(testDir, 'post.md');
      await fs.writeFile(postPath, '---\ntitle: Hello\n---\nText');
      client.createPost.mockResolvedValue(ok({ id: 'post-1', url: 'https://medium.com/@tester/hello-1' }));

      await program().parseAsync(['node', 'mdpub', '-p', postPath, '-s', 'public', '-c', 'custom.config']);

      expect(loadConfig).toHaveBeenCalledWith({ configPath: 'custom.config' });
      expect(createClient).toHaveBeenCalledWith(config);
      expect(client.createPost).toHaveBeenCalledWith('author-1', {
        title: 'Hello',
        publishStatus: 'public',
        content: '# Hello\n\nText',
        contentFormat: 'markdown',
      });
      expect(setExitCode).not.toHaveBeenCalled();
    });

    it('should default to draft and set a failing exit code', async () => {
      const postPath = path.join(testDir, 'post.md');
      await fs.writeFile(postPath, 'Text');
      client.createPost.mockResolvedValue(fail('Post creation failed with HTTP 403'));

      await program().parseAsync(['node', 'mdpub', '--post', postPath]);

      expect(client.createPost.mock.calls[0][1].publishStatus).toBe('draft');
      expect(setExitCode).toHaveBeenCalledWith(1);
    });
  });

  describe('runPublisher', () => {
    it('should stop before any network call when the token is missing', async () => {
      loadConfig.mockRejectedValue(new ConfigError('MEDIUM_AUTH_TOKEN is not set'));

      const code = await runPublisher(options({ post: 'post.md' }), {
        loadConfig,
        createClient,
        logger: new Logger(),
      });

      expect(code).toBe(1);
      expect(createClient).not.toHaveBeenCalled();
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Medium Token not found...'));
    });

    it('should publish every file of a list in order', async () => {
      const first = path.join(testDir, 'first.md');
      const second = path.join(testDir, 'second.md');
      await fs.writeFile(first, '---\ntitle: First\n---\nOne');
      await fs.writeFile(second, '---\ntitle: Second\n---\nTwo');
      const listPath = path.join(testDir, 'posts.txt');
      await fs.writeFile(listPath, `${first}\r\n\n${second}\n`);
      client.createPost
        .mockResolvedValueOnce(fail('Post creation failed with HTTP 500'))
        .mockResolvedValueOnce(ok({ id: 'post-2', url: 'https://medium.com/@tester/second-2' }));

      const code = await runPublisher(options({ list: listPath }), {
        loadConfig,
        createClient,
        logger: new Logger(),
      });

      expect(code).toBe(1);
      expect(client.createPost.mock.calls.map(([, request]) => request.title)).toEqual(['First', 'Second']);
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining(first));
      expect(console.log).toHaveBeenCalledWith(expect.stringContaining('https://medium.com/@tester/second-2'));
    });

    it('should fail when the list file cannot be read', async () => {
      const code = await runPublisher(options({ list: path.join(testDir, 'missing.txt') }), {
        loadConfig,
        createClient,
        logger: new Logger(),
      });

      expect(code).toBe(1);
      expect(client.getAuthorId).not.toHaveBeenCalled();
    });

    it('should not contact Medium in dry run mode', async () => {
      const postPath = path.join(testDir, 'post.md');
      await fs.writeFile(postPath, '![diagram](./diagram.png)');

      const code = await runPublisher(options({ post: postPath, dryRun: true }), {
        loadConfig,
        createClient,
        logger: new Logger(),
      });

      expect(code).toBe(0);
      expect(client.uploadImage).not.toHaveBeenCalled();
      expect(client.createPost).not.toHaveBeenCalled();
    });
  });
});
