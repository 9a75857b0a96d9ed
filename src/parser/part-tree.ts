import { componentLogger } from "../config/logger.js";
import type { AttachmentMeta, RawPart } from "../types/index.js";
import { BodyDecodeError, decodeBodyBytes, decodeBytes } from "./body.js";
import {
  decodeEncodedWords,
  parseStructuredHeader,
  toHeaderMap,
  type HeaderMap,
} from "./headers.js";

const log = componentLogger("parser");

export interface ContainerNode {
  kind: "container";
  subtype: string;
  headers: HeaderMap;
  children: PartNode[];
}

export interface LeafNode {
  kind: "leaf";
  mimeType: string;
  headers: HeaderMap;
  filename: string | null;
  encoding: string | null;
  data: string | null;
  size: number;
  attachmentId: string | null;
}

export type PartNode = ContainerNode | LeafNode;

export interface TextSegment {
  kind: "plain" | "html";
  text: string;
}

export interface PartContent {
  segments: TextSegment[];
  attachments: AttachmentMeta[];
  htmlPresent: boolean;
}

function toNode(part: RawPart): PartNode {
  const mimeType = part.mimeType.trim().toLowerCase();
  const headers = toHeaderMap(part.headers);

  if ((part.parts?.length ?? 0) > 0 || mimeType.startsWith("multipart/")) {
    return {
      kind: "container",
      subtype: mimeType.startsWith("multipart/") ? mimeType.slice("multipart/".length) : "mixed",
      headers,
      children: [],
    };
  }

  return {
    kind: "leaf",
    mimeType,
    headers,
    filename: resolveFilename(part.filename, headers),
    encoding: part.body?.encoding ?? null,
    data: part.body?.data ?? null,
    size: part.body?.size ?? 0,
    attachmentId: part.body?.attachmentId || null,
  };
}

export function toPartNode(part: RawPart): PartNode {
  const root = toNode(part);
  const stack: Array<[RawPart, PartNode]> = [[part, root]];
  for (let item = stack.pop(); item; item = stack.pop()) {
    const [raw, node] = item;
    if (node.kind !== "container") continue;
    for (const child of raw.parts ?? []) {
      const childNode = toNode(child);
      node.children.push(childNode);
      stack.push([child, childNode]);
    }
  }
  return root;
}

function resolveFilename(explicit: string | null | undefined, headers: HeaderMap): string | null {
  const candidate =
    explicit ||
    parseStructuredHeader(headers.get("content-disposition")).params.filename ||
    parseStructuredHeader(headers.get("content-type")).params.name ||
    "";
  const decoded = decodeEncodedWords(candidate).trim();
  return decoded || null;
}

function isAttachment(leaf: LeafNode): boolean {
  const disposition = parseStructuredHeader(leaf.headers.get("content-disposition")).value;
  return disposition === "attachment" || leaf.filename !== null || leaf.attachmentId !== null;
}

function decodeLeafText(leaf: LeafNode): string {
  if (!leaf.data) return "";
  const charset = parseStructuredHeader(leaf.headers.get("content-type")).params.charset;
  try {
    const decoded = decodeBodyBytes(leaf.data, leaf.encoding);
    if (decoded.lossy) {
      log.debug({ encoding: leaf.encoding, mimeType: leaf.mimeType }, "Unknown transfer encoding, decoding best-effort");
    }
    return decodeBytes(decoded.bytes, decoded.charset ?? charset);
  } catch (err) {
    if (err instanceof BodyDecodeError) {
      log.warn({ encoding: err.encoding, mimeType: leaf.mimeType, error: err.message }, "Failed to decode part body");
      return "";
    }
    throw err;
  }
}

/**
 * Walk the part tree depth-first, collecting text contributions and
 * attachment metadata. Within multipart/alternative only the last child
 * offering plain text (or, failing that, HTML) contributes.
 */
export function collectContent(root: PartNode): PartContent {
  const content: PartContent = { segments: [], attachments: [], htmlPresent: false };
  content.segments = walk(root, content);
  return content;
}

interface WalkFrame {
  node: ContainerNode;
  contributions: TextSegment[][];
  next: number;
}

function walk(root: PartNode, content: PartContent): TextSegment[] {
  if (root.kind === "leaf") return walkLeaf(root, content);

  let result: TextSegment[] = [];
  const frames: WalkFrame[] = [{ node: root, contributions: [], next: 0 }];
  while (frames.length > 0) {
    const frame = frames[frames.length - 1];
    if (frame.next < frame.node.children.length) {
      const child = frame.node.children[frame.next];
      frame.next += 1;
      if (child.kind === "leaf") frame.contributions.push(walkLeaf(child, content));
      else frames.push({ node: child, contributions: [], next: 0 });
      continue;
    }

    frames.pop();
    const segments =
      frame.node.subtype === "alternative"
        ? pickAlternative(frame.contributions)
        : frame.contributions.flat();
    const parent = frames.at(-1);
    if (parent) parent.contributions.push(segments);
    else result = segments;
  }
  return result;
}

function walkLeaf(leaf: LeafNode, content: PartContent): TextSegment[] {
  if (isAttachment(leaf)) {
    content.attachments.push({
      filename: leaf.filename,
      mimeType: leaf.mimeType,
      size: leaf.size,
      attachmentId: leaf.attachmentId,
    });
    return [];
  }

  if (leaf.mimeType !== "text/plain" && leaf.mimeType !== "text/html") {
    return [];
  }
  const kind = leaf.mimeType === "text/html" ? "html" : "plain";
  if (kind === "html") content.htmlPresent = true;
  const text = decodeLeafText(leaf);
  return text.trim() ? [{ kind, text }] : [];
}

function pickAlternative(contributions: TextSegment[][]): TextSegment[] {
  const withPlain = contributions.filter((segments) => segments.some((s) => s.kind === "plain"));
  if (withPlain.length > 0) return withPlain[withPlain.length - 1];
  const withHtml = contributions.filter((segments) => segments.some((s) => s.kind === "html"));
  if (withHtml.length > 0) return withHtml[withHtml.length - 1];
  return [];
}
