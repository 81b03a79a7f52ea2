/**
 * answerkit Engine — Persistence Writer
 *
 * Setup is strict about the file's byte shape: UTF-8 without a byte-order
 * mark, an explicit declaration, and indented markup. The serializer walks
 * the DOM itself so that shape does not depend on a library's defaults.
 *
 * Writes go to a sibling temp file that is renamed over the target, so the
 * target is always a complete snapshot.
 */

import * as fs from "fs";
import * as path from "path";
import {
  CDATA_SECTION_NODE,
  COMMENT_NODE,
  PROCESSING_INSTRUCTION_NODE,
  TEXT_NODE,
  isElement,
} from "./accessor";
import { AnswerFileError, errorMessage } from "./errors";

export const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';
export const DEFAULT_NEWLINE = "\r\n";
const INDENT = "  ";

export interface SerializeOptions {
  newline?: string;
}

// ─── Escaping ────────────────────────────────────────────────────

export function escapeText(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/\r/g, "&#xD;");
}

export function escapeAttribute(value: string): string {
  return escapeText(value)
    .replace(/"/g, "&quot;")
    .replace(/\n/g, "&#xA;")
    .replace(/\t/g, "&#x9;");
}

// ─── Serializer ──────────────────────────────────────────────────

function isTextLike(node: Node): boolean {
  return node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE;
}

function isBlank(node: Node): boolean {
  return isTextLike(node) && (node.nodeValue ?? "").trim() === "";
}

function children(node: Node): Node[] {
  const nodes: Node[] = [];
  for (let i = 0; i < node.childNodes.length; i++) {
    nodes.push(node.childNodes.item(i));
  }
  return nodes;
}

function openTag(el: Element): string {
  let tag = `<${el.nodeName}`;
  for (let i = 0; i < el.attributes.length; i++) {
    const attr = el.attributes.item(i);
    if (attr) tag += ` ${attr.name}="${escapeAttribute(attr.value)}"`;
  }
  return tag;
}

/** Serialize a node with no added whitespace (mixed content) */
function inline(node: Node): string {
  if (isElement(node)) {
    const content = children(node).map(inline).join("");
    return content === ""
      ? `${openTag(node)} />`
      : `${openTag(node)}>${content}</${node.nodeName}>`;
  }
  return leaf(node) ?? "";
}

function leaf(node: Node): string | null {
  const value = node.nodeValue ?? "";
  switch (node.nodeType) {
    case TEXT_NODE:
      return escapeText(value);
    case CDATA_SECTION_NODE:
      return `<![CDATA[${value.replace(/]]>/g, "]]]]><![CDATA[>")}]]>`;
    case COMMENT_NODE:
      return `<!--${value}-->`;
    case PROCESSING_INSTRUCTION_NODE:
      return `<?${node.nodeName} ${value}?>`;
    default:
      return null;
  }
}

function writeNode(node: Node, depth: number, lines: string[]): void {
  const pad = INDENT.repeat(depth);

  if (!isElement(node)) {
    const text = leaf(node);
    if (text !== null && !isBlank(node)) lines.push(pad + text);
    return;
  }

  // Whitespace-only text between child nodes is formatting; alone it is the value
  const all = children(node);
  const hasText = all.some((child) => isTextLike(child) && !isBlank(child));
  const structural = all.some((child) => !isTextLike(child));
  const content = structural && !hasText ? all.filter((child) => !isBlank(child)) : all;

  if (content.length === 0) {
    lines.push(`${pad}${openTag(node)} />`);
  } else if (content.every(isTextLike)) {
    lines.push(`${pad}${openTag(node)}>${content.map(inline).join("")}</${node.nodeName}>`);
  } else if (hasText) {
    // Mixed content: whitespace is significant, keep it as is
    lines.push(`${pad}${inline(node)}`);
  } else {
    lines.push(`${pad}${openTag(node)}>`);
    for (const child of content) {
      writeNode(child, depth + 1, lines);
    }
    lines.push(`${pad}</${node.nodeName}>`);
  }
}

export function serializeAnswerDocument(
  doc: Document,
  options: SerializeOptions = {},
): string {
  const lines = [XML_DECLARATION];
  for (const node of children(doc)) {
    // The parsed declaration comes back as a processing instruction
    if (node.nodeType === PROCESSING_INSTRUCTION_NODE && node.nodeName === "xml") continue;
    writeNode(node, 0, lines);
  }
  return lines.join(options.newline ?? DEFAULT_NEWLINE);
}

// ─── Save ────────────────────────────────────────────────────────

/**
 * Serialize `doc` and write it to `filePath` as UTF-8 without a BOM.
 * Throws SERIALIZATION_FAILURE when the file cannot be written.
 */
export function saveAnswerDocument(
  doc: Document,
  filePath: string,
  options: SerializeOptions = {},
): void {
  const bytes = Buffer.from(serializeAnswerDocument(doc, options), "utf8");
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.tmp`);

  try {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(tempPath, bytes);
    fs.renameSync(tempPath, filePath);
  } catch (err: unknown) {
    if (fs.existsSync(tempPath)) fs.rmSync(tempPath, { force: true });
    throw new AnswerFileError(
      "SERIALIZATION_FAILURE",
      `Could not write answer file ${filePath}: ${errorMessage(err)}`,
      { path: filePath },
    );
  }
}
