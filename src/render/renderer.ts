/**
 * Block tree -> Markdown renderer.
 *
 * Rendering is split in two passes: image URLs are collected and resolved
 * through the asset resolver first, then the tree is rendered synchronously.
 * Each block type maps to exactly one rule; rules never throw on malformed
 * payloads.
 */
import path from 'node:path';
import { getArray, getBoolean, getRecord, getString } from '../utils/records.js';
import { formatRichText, richText } from './rich-text.js';
import type { AssetResolver } from './assets.js';
import type { Block, BlockType, RenderContext, RenderResult } from './types.js';

const INDENT = '  ';

const HEADING_TYPES: ReadonlySet<BlockType> = new Set(['heading_1', 'heading_2', 'heading_3']);
const LIST_TYPES: ReadonlySet<BlockType> = new Set(['bulleted_list_item', 'numbered_list_item', 'to_do']);

const STREAMING_VIDEO_HOSTS = ['youtube.com', 'youtu.be', 'vimeo.com'];

/** Source language label (lowercased) -> fenced code tag. */
const LANGUAGE_TAGS: ReadonlyMap<string, string> = new Map([
  ['plain text', ''],
  ['javascript', 'javascript'],
  ['typescript', 'typescript'],
  ['python', 'python'],
  ['java', 'java'],
  ['c++', 'cpp'],
  ['c#', 'csharp'],
  ['ruby', 'ruby'],
  ['go', 'go'],
  ['rust', 'rust'],
  ['shell', 'bash'],
  ['bash', 'bash'],
  ['sql', 'sql'],
  ['json', 'json'],
  ['yaml', 'yaml'],
  ['xml', 'xml'],
  ['html', 'html'],
  ['css', 'css'],
  ['markdown', 'markdown'],
  ['dockerfile', 'dockerfile'],
]);

export interface RenderOptions {
  /** Directory downloaded assets are written into */
  assetDir: string;
  /** Prefix for asset references in the output (default: "images") */
  assetPrefix?: string;
  /** Resolver used for image downloads; without one, images link to their source URL */
  resolver?: AssetResolver;
}

export function createRenderContext(
  assetDir: string,
  assetPrefix: string,
  resolvedAssets: Map<string, string | null> = new Map(),
): RenderContext {
  return {
    assetDir,
    assetPrefix,
    assets: [],
    depth: 0,
    listCounter: 0,
    resolvedAssets,
  };
}

/**
 * Render a block tree to Markdown, downloading referenced images first.
 */
export async function renderDocument(blocks: Block[], options: RenderOptions): Promise<RenderResult> {
  const resolvedAssets = new Map<string, string | null>();
  if (options.resolver) {
    for (const url of collectImageUrls(blocks)) {
      if (!resolvedAssets.has(url)) {
        resolvedAssets.set(url, await options.resolver.resolve(url, options.assetDir));
      }
    }
  }

  const ctx = createRenderContext(options.assetDir, options.assetPrefix ?? 'images', resolvedAssets);
  const text = renderBlocks(blocks, ctx);
  return { text, assets: ctx.assets };
}

/**
 * Collect every image URL in the tree, in document order.
 */
export function collectImageUrls(blocks: Block[]): string[] {
  const urls: string[] = [];
  const visit = (list: Block[]): void => {
    for (const block of list) {
      if (block.type === 'image') {
        const url = mediaUrl(block.content);
        if (url) urls.push(url);
      }
      visit(block.children);
    }
  };
  visit(blocks);
  return urls;
}

/**
 * Render a top-level block sequence with spacing rules and whitespace
 * normalization applied.
 */
export function renderBlocks(blocks: Block[], ctx: RenderContext): string {
  const lines: string[] = [];
  let prevType: BlockType | null = null;

  for (const block of blocks) {
    if (prevType !== null && needsSpacing(prevType, block.type)) {
      lines.push('');
    }
    if (block.type !== 'numbered_list_item') {
      ctx.listCounter = 0;
    }

    const markdown = renderBlock(block, ctx);
    if (markdown !== null) {
      lines.push(markdown);
    }
    prevType = block.type;
  }

  return normalizeWhitespace(lines.join('\n'));
}

/**
 * Whether a blank line separates two adjacent top-level blocks.
 */
export function needsSpacing(prev: BlockType, curr: BlockType): boolean {
  if (HEADING_TYPES.has(prev) || HEADING_TYPES.has(curr)) return true;
  if (LIST_TYPES.has(prev) !== LIST_TYPES.has(curr)) return true;
  if (prev === 'code' || curr === 'code') return true;
  if (prev === 'divider' || curr === 'divider') return true;
  return false;
}

/**
 * Strip trailing whitespace, cap blank-line runs at two, drop leading blank
 * lines, and end with a single newline. Leading indentation is kept.
 */
export function normalizeWhitespace(content: string): string {
  const result: string[] = [];
  let blankCount = 0;
  for (const raw of content.split('\n')) {
    const line = raw.trimEnd();
    if (line === '') {
      blankCount++;
      if (blankCount <= 2) result.push(line);
    } else {
      blankCount = 0;
      result.push(line);
    }
  }
  return result.join('\n').replace(/^\n+/, '').trimEnd() + '\n';
}

/**
 * Render one block. Returns null when the block contributes nothing.
 */
export function renderBlock(block: Block, ctx: RenderContext): string | null {
  const { content } = block;

  switch (block.type) {
    case 'paragraph':
      return withChildren(richText(content), block, ctx);
    case 'heading_1':
      return `# ${richText(content)}`;
    case 'heading_2':
      return `## ${richText(content)}`;
    case 'heading_3':
      return `### ${richText(content)}`;
    case 'bulleted_list_item':
      return withChildren(`- ${richText(content)}`, block, ctx);
    case 'numbered_list_item':
      ctx.listCounter++;
      return withChildren(`${ctx.listCounter}. ${richText(content)}`, block, ctx);
    case 'to_do': {
      const checkbox = getBoolean(content, 'checked') ? '[x]' : '[ ]';
      return withChildren(`- ${checkbox} ${richText(content)}`, block, ctx);
    }
    case 'toggle':
      return renderToggle(block, ctx);
    case 'code':
      return renderCode(content);
    case 'quote':
      return renderQuoted(richText(content), '', block, ctx);
    case 'callout':
      return renderQuoted(richText(content), calloutIcon(content), block, ctx);
    case 'divider':
      return '---';
    case 'image':
      return renderImage(content, ctx);
    case 'video':
      return renderVideo(content);
    case 'embed':
      return renderLink(content, '🧩', 'Embedded content', 'Embed');
    case 'bookmark':
      return renderLink(content, '🔗', null, 'Bookmark');
    case 'link_preview':
      return renderLink(content, '🌐', null, 'Link preview');
    case 'file':
      return renderFile(content, '📎', 'File', getString(content, 'name'));
    case 'pdf':
      return renderFile(content, '📄', 'PDF Document', '');
    case 'audio':
      return renderFile(content, '🎵', 'Audio', '');
    case 'table':
      return renderTable(block);
    case 'table_row':
    case 'column':
      // consumed by their parent
      return null;
    case 'column_list':
      return renderColumnList(block, ctx);
    case 'child_page':
      return `📄 **${getString(content, 'title', 'Untitled')}** (subpage)`;
    case 'child_database':
      return `🗃️ **${getString(content, 'title', 'Untitled Database')}** (database)`;
    case 'synced_block':
      return block.children.length > 0 ? renderChildren(block.children, ctx, false) : null;
    case 'template':
      return `📋 Template: ${richText(content)}`;
    case 'equation':
      return `$$\n${getString(content, 'expression')}\n$$`;
    case 'breadcrumb':
      return null;
    case 'table_of_contents':
      return '<!-- Table of Contents (auto-generated in Notion) -->';
    case 'unknown':
      return `<!-- Unsupported block type: ${block.rawType} -->`;
    default: {
      const exhaustive: never = block.type;
      return `<!-- Unsupported block type: ${String(exhaustive)} -->`;
    }
  }
}

/**
 * Render children inside their own scope. The parent's depth and list
 * counter are restored on return.
 */
export function renderChildren(children: Block[], ctx: RenderContext, indent: boolean): string {
  const saved = { depth: ctx.depth, listCounter: ctx.listCounter };
  ctx.depth = indent ? saved.depth + 1 : saved.depth;
  ctx.listCounter = 0;

  try {
    const parts: string[] = [];
    for (const child of children) {
      if (child.type !== 'numbered_list_item') {
        ctx.listCounter = 0;
      }
      const markdown = renderBlock(child, ctx);
      if (markdown !== null) {
        parts.push(indent ? indentLines(markdown) : markdown);
      }
    }
    return parts.join('\n');
  } finally {
    ctx.depth = saved.depth;
    ctx.listCounter = saved.listCounter;
  }
}

/**
 * Indent every line by one level. Nested output is already indented
 * relative to its parent, so each scope adds exactly one level.
 */
function indentLines(text: string): string {
  return text.split('\n').map(line => INDENT + line).join('\n');
}

function withChildren(text: string, block: Block, ctx: RenderContext): string {
  if (block.children.length === 0) return text;
  return `${text}\n${renderChildren(block.children, ctx, true)}`;
}

function renderToggle(block: Block, ctx: RenderContext): string {
  let result = `<details>\n<summary>${richText(block.content)}</summary>\n`;
  if (block.children.length > 0) {
    result += `\n${renderChildren(block.children, ctx, false)}\n`;
  }
  return result + '</details>';
}

function renderCode(content: Record<string, unknown>): string {
  const code = richText(content);
  const label = getString(content, 'language').toLowerCase();
  const lang = LANGUAGE_TAGS.get(label) ?? label;
  const caption = richText(content, 'caption');

  const result = '```' + lang + '\n' + code + '\n```';
  return caption ? `${result}\n*${caption}*` : result;
}

function calloutIcon(content: Record<string, unknown>): string {
  const icon = getRecord(content, 'icon');
  return getString(icon, 'type') === 'emoji' ? getString(icon, 'emoji') : '';
}

/**
 * Blockquote rendering shared by quote and callout. Children render flat
 * and are quoted line by line.
 */
function renderQuoted(text: string, icon: string, block: Block, ctx: RenderContext): string {
  const firstPrefix = icon ? `> ${icon} ` : '> ';
  let result = text
    .split('\n')
    .map((line, i) => (i === 0 ? firstPrefix : '> ') + line)
    .join('\n');

  if (block.children.length > 0) {
    const children = renderChildren(block.children, ctx, false);
    result += '\n' + children.split('\n').map(line => `> ${line}`).join('\n');
  }
  return result;
}

/**
 * URL of an external or hosted file payload, or null when absent.
 */
export function mediaUrl(content: Record<string, unknown>): string | null {
  const type = getString(content, 'type');
  if (type !== 'external' && type !== 'file') return null;
  const url = getString(getRecord(content, type), 'url');
  return url || null;
}

function withCaption(result: string, caption: string): string {
  return caption ? `${result}\n*${caption}*` : result;
}

function renderImage(content: Record<string, unknown>, ctx: RenderContext): string {
  const url = mediaUrl(content);
  if (!url) return '<!-- Image URL not found -->';

  let reference = url;
  const localPath = ctx.resolvedAssets.get(url);
  if (localPath) {
    ctx.assets.push(localPath);
    const name = path.basename(localPath);
    reference = ctx.assetPrefix ? `${ctx.assetPrefix}/${name}` : name;
  }

  const caption = richText(content, 'caption');
  return withCaption(`![${caption || 'Image'}](${reference})`, caption);
}

export function isStreamingVideoUrl(url: string): boolean {
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return false;
  }
  return STREAMING_VIDEO_HOSTS.some(domain => host === domain || host.endsWith(`.${domain}`));
}

function renderVideo(content: Record<string, unknown>): string {
  const url = mediaUrl(content);
  if (!url) return '<!-- Video URL not found -->';

  const result = isStreamingVideoUrl(url) ? `[![Video](${url})](${url})` : `[Video](${url})`;
  return withCaption(result, richText(content, 'caption'));
}

function renderLink(
  content: Record<string, unknown>,
  glyph: string,
  defaultTitle: string | null,
  label: string,
): string {
  const url = getString(content, 'url');
  if (!url) return `<!-- ${label} URL not found -->`;
  const title = richText(content, 'caption') || defaultTitle || url;
  return `${glyph} [${title}](${url})`;
}

function renderFile(
  content: Record<string, unknown>,
  glyph: string,
  label: string,
  name: string,
): string {
  const url = mediaUrl(content);
  if (!url) return `<!-- ${label} not found -->`;
  const title = name || richText(content, 'caption') || label;
  return `${glyph} [${title}](${url})`;
}

function renderTable(block: Block): string {
  const hasHeader = getBoolean(block.content, 'has_column_header');
  const rows: string[] = [];

  for (const row of block.children) {
    if (row.type !== 'table_row') continue;
    const cells = getArray(row.content, 'cells').map(cell => formatRichText(cell));
    rows.push(`| ${cells.join(' | ')} |`);
    if (rows.length === 1 && hasHeader) {
      rows.push(`| ${cells.map(() => '---').join(' | ')} |`);
    }
  }

  return rows.length > 0 ? rows.join('\n') : '<!-- Empty table -->';
}

function renderColumnList(block: Block, ctx: RenderContext): string | null {
  const parts: string[] = [];
  for (const column of block.children) {
    if (column.children.length > 0) {
      parts.push(renderChildren(column.children, ctx, false));
    }
  }
  return parts.length > 0 ? parts.join('\n\n') : null;
}
