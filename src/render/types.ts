/**
 * Type definitions for the Markdown renderer.
 */

export const BLOCK_TYPES = [
  'paragraph',
  'heading_1',
  'heading_2',
  'heading_3',
  'bulleted_list_item',
  'numbered_list_item',
  'to_do',
  'toggle',
  'code',
  'quote',
  'callout',
  'divider',
  'image',
  'video',
  'embed',
  'bookmark',
  'link_preview',
  'file',
  'pdf',
  'audio',
  'table',
  'table_row',
  'column_list',
  'column',
  'child_page',
  'child_database',
  'synced_block',
  'template',
  'equation',
  'breadcrumb',
  'table_of_contents',
  'unknown',
] as const;

export type BlockType = (typeof BLOCK_TYPES)[number];

/**
 * One node of a source document, with its children already expanded.
 */
export interface Block {
  /** Block ID (dashes stripped) */
  id: string;
  /** Normalized type tag; unrecognized tags become 'unknown' */
  type: BlockType;
  /** Type tag exactly as the source reported it */
  rawType: string;
  hasChildren: boolean;
  /** Type-specific payload, read only through the defaulting accessors */
  content: Record<string, unknown>;
  children: Block[];
}

/**
 * One styled run of inline text.
 */
export interface TextSpan {
  text: string;
  href: string | null;
  bold: boolean;
  italic: boolean;
  strikethrough: boolean;
  underline: boolean;
  code: boolean;
}

/**
 * Mutable state threaded through one renderDocument() call.
 */
export interface RenderContext {
  /** Directory assets are written into */
  assetDir: string;
  /** Path prefix used for asset references in the output */
  assetPrefix: string;
  /** Local paths of assets referenced so far, in document order */
  assets: string[];
  /** Current nesting depth (0 at top level) */
  depth: number;
  /** Running counter for the current numbered list */
  listCounter: number;
  /** Asset URL -> local path, or null when the download failed */
  resolvedAssets: Map<string, string | null>;
}

export interface RenderResult {
  text: string;
  assets: string[];
}

const BLOCK_TYPE_SET: ReadonlySet<string> = new Set(BLOCK_TYPES);

export function isBlockType(value: string): value is BlockType {
  return BLOCK_TYPE_SET.has(value);
}
