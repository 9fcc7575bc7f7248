import path from 'path';
import type { PostRequest, PublishStatus } from '@mdpub/shared';
import type { PostFrontMatter } from './types.js';

export interface PayloadInput {
  metadata: PostFrontMatter;
  body: string;
  filePath: string;
  publishStatus: PublishStatus;
  /** Author footer text, appended after the body */
  footer?: string;
}

/**
 * Title-case every run of letters: first letter upper-case, the rest lower-case
 */
function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

/**
 * `machine-learning` -> `Machine Learning`
 */
export function normalizeTag(tag: string): string {
  return titleCase(tag.replace(/-/g, ' ').trim());
}

export function normalizeTags(tags: readonly string[]): string[] {
  return tags.map(normalizeTag);
}

function bannerImage(imagePath: string): string {
  const name = path.parse(path.basename(imagePath)).name;
  return `![${name}](${imagePath})\n\n`;
}

/**
 * Build the Medium post request for one markdown file
 */
export function buildPostRequest(input: PayloadInput): PostRequest {
  const { metadata, body, filePath, publishStatus, footer } = input;

  const title = metadata.title ? metadata.title : path.basename(filePath);

  const content = [
    `# ${title}\n\n`,
    metadata.description ? `${metadata.description}\n\n` : '',
    metadata.image ? bannerImage(metadata.image) : '',
    body,
    footer ? `\n\n${footer}` : '',
  ].join('');

  const request: PostRequest = {
    title,
    publishStatus,
    content,
    contentFormat: 'markdown',
  };

  if (metadata.tags && metadata.tags.length > 0) {
    request.tags = normalizeTags(metadata.tags);
  }

  return request;
}
