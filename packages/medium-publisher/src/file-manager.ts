import { promises as fs } from 'fs';
import path from 'path';

export const DEFAULT_FOOTER_PATH = path.join('config', 'socials.md');

/**
 * File access for list files and the author footer
 */
export class FileManager {
  /**
   * Read a list file: one markdown path per line, blank lines ignored
   */
  async readPathList(listPath: string): Promise<string[]> {
    try {
      const content = await fs.readFile(listPath, 'utf-8');
      return content
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0);
    } catch (error) {
      throw new Error(
        `Failed to read list file "${listPath}": ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  /**
   * Read the author footer fragment appended to posts
   */
  async readFooter(footerPath: string = DEFAULT_FOOTER_PATH): Promise<string> {
    try {
      const content = await fs.readFile(footerPath, 'utf-8');
      return content.trimEnd();
    } catch (error) {
      throw new Error(
        `Failed to read author footer "${footerPath}": ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  /**
   * Resolve symlinks so that relative image paths follow the real file
   */
  async realPath(filePath: string): Promise<string> {
    return fs.realpath(filePath);
  }
}
