import type { Attachment } from "discord.js";
import { logger } from "./logger.js";

export type AttachmentSource = Pick<Attachment, "name" | "size" | "url">;

export interface AttachmentLimits {
  /** Largest attachment accepted, in bytes. */
  maxFileSize: number;
  /** Characters of each attachment's text passed on to the model. */
  maxTextLength: number;
}

export type AttachmentDownloader = (url: string) => Promise<Uint8Array>;

export type AttachmentResult = { ok: true; text: string } | { ok: false; error: string };

export async function downloadAttachment(url: string): Promise<Uint8Array> {
  const res = await fetch(url);
  if (!res.ok) throw new Error(`Attachment download failed: ${res.status} ${res.statusText}`);
  return new Uint8Array(await res.arrayBuffer());
}

/** Strict UTF-8 decode; null when the bytes are not valid UTF-8. */
export function decodeText(data: Uint8Array): string | null {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(data);
  } catch {
    return null;
  }
}

/**
 * Reads text attachments in order and joins them, each prefixed by a blank line.
 * Stops at the first attachment that is too large, not text, or cannot be fetched.
 */
export async function readTextAttachments(
  attachments: Iterable<AttachmentSource>,
  limits: AttachmentLimits,
  download: AttachmentDownloader = downloadAttachment
): Promise<AttachmentResult> {
  let text = "";

  for (const att of attachments) {
    if (att.size > limits.maxFileSize) {
      return { ok: false, error: `${att.name} is too large (max ${limits.maxFileSize} bytes).` };
    }

    let data: Uint8Array;
    try {
      data = await download(att.url);
    } catch (error) {
      logger.warn(`Could not download attachment ${att.name}:`, error);
      return { ok: false, error: `Could not download ${att.name}.` };
    }

    const decoded = decodeText(data);
    if (decoded === null) return { ok: false, error: `${att.name} is not a text file.` };

    text += "\n\n" + decoded.slice(0, limits.maxTextLength);
  }

  return { ok: true, text };
}
