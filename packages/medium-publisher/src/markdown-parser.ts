import matter from 'gray-matter';
import { promises as fs } from 'fs';
import { PostFrontMatterSchema, type ParsedPost, type PostFrontMatter } from './types.js';

/**
 * Splits markdown posts into front-matter and body
 */
export class MarkdownParser {
  /**
   * Parse a markdown file and validate its front-matter
   */
  async parseFile(filePath: string): Promise<ParsedPost> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new Error(
        `Failed to parse markdown file "${filePath}": ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }

    return this.parseString(raw, filePath);
  }

  /**
   * Parse markdown source that has already been read
   */
  parseString(raw: string, filePath: string): ParsedPost {
    try {
      // An options object bypasses gray-matter's cache, which hands back shared objects
      const parsed = matter(raw, {});

      return {
        metadata: this.validateFrontMatter(parsed.data),
        body: parsed.content.trim(),
        originalPath: filePath,
      };
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Failed to parse markdown file "${filePath}": ${error.message}`);
      }
      throw new Error(`Failed to parse markdown file "${filePath}": Unknown error`);
    }
  }

  /**
   * Validate front-matter against schema
   */
  private validateFrontMatter(data: Record<string, unknown>): PostFrontMatter {
    const result = PostFrontMatterSchema.safeParse(data);
    if (!result.success) {
      const details = result.error.issues
        .map(issue => `${issue.path.join('.') || 'front-matter'}: ${issue.message}`)
        .join('; ');
      throw new Error(`Invalid front-matter: ${details}`);
    }
    return result.data;
  }
}
