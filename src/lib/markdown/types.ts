export type TableCell = string | number | boolean | Date | null | undefined;

export interface HeadingBlock {
  type: "heading";
  /** Any number; the generator clamps it to 1-6 */
  level: number;
  text: string;
}

export interface TextBlock {
  type: "text";
  text: string;
}

export interface ListBlock {
  type: "list";
  items: string[];
  ordered: boolean;
}

export interface TableBlock {
  type: "table";
  /** First row is the header */
  rows: TableCell[][];
}

export interface ImageBlock {
  type: "image";
  alt: string;
  src: string;
}

export interface CodeBlock {
  type: "code";
  code: string;
  language: string;
}

export interface LinkBlock {
  type: "link";
  text: string;
  url: string;
}

export interface BlockquoteBlock {
  type: "blockquote";
  text: string;
}

export interface HorizontalRuleBlock {
  type: "horizontal_rule";
}

export type ContentBlock =
  | HeadingBlock
  | TextBlock
  | ListBlock
  | TableBlock
  | ImageBlock
  | CodeBlock
  | LinkBlock
  | BlockquoteBlock
  | HorizontalRuleBlock;

export type ContentBlockType = ContentBlock["type"];

/**
 * What every parser hands to the Markdown generator.
 */
export interface ParsedDocument {
  title: string;
  titleLevel?: number;
  blocks: ContentBlock[];
}
