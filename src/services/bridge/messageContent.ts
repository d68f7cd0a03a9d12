/**
 * Noise filtering and content extraction for inbound WhatsApp messages.
 */

import type { MediaMessage, WhatsAppMessageContent } from "../whatsapp.js";

export type MediaKind = "image" | "video" | "audio" | "document" | "sticker";

export interface MediaAttachment {
  kind: MediaKind;
  media: MediaMessage;
  mimeType: string;
  fileName: string;
  caption: string;
}

export function extractText(message: WhatsAppMessageContent): string {
  return message.conversation || message.extendedTextMessage?.text || "";
}

function pickMedia(message: WhatsAppMessageContent): { kind: MediaKind; media: MediaMessage } | null {
  if (message.imageMessage) return { kind: "image", media: message.imageMessage };
  if (message.videoMessage) return { kind: "video", media: message.videoMessage };
  if (message.audioMessage) return { kind: "audio", media: message.audioMessage };
  if (message.documentMessage) return { kind: "document", media: message.documentMessage };
  if (message.stickerMessage) return { kind: "sticker", media: message.stickerMessage };
  return null;
}

const DEFAULT_MIME: Record<MediaKind, string> = {
  image: "image/jpeg",
  video: "video/mp4",
  audio: "audio/ogg",
  document: "application/pdf",
  sticker: "image/webp",
};

function fileNameFor(kind: MediaKind, media: MediaMessage, mimeType: string, messageId: string): string {
  switch (kind) {
    case "image":
      return mimeType === "image/png" ? `${messageId}.png` : `${messageId}.jpg`;
    case "video":
      return `${messageId}.mp4`;
    case "audio":
      return mimeType === "audio/mpeg" ? `${messageId}.mp3` : `${messageId}.ogg`;
    case "document":
      return media.fileName || `${messageId}.pdf`;
    case "sticker":
      return `${messageId}.webp`;
  }
}

export function extractMedia(message: WhatsAppMessageContent, messageId: string): MediaAttachment | null {
  const picked = pickMedia(message);
  if (!picked) return null;

  const mimeType = picked.media.mimetype || DEFAULT_MIME[picked.kind];
  // Audio and stickers never carry a caption
  const caption = picked.kind === "audio" || picked.kind === "sticker" ? "" : picked.media.caption ?? "";

  return {
    kind: picked.kind,
    media: picked.media,
    mimeType,
    fileName: fileNameFor(picked.kind, picked.media, mimeType, messageId),
    caption,
  };
}

/**
 * True for messages with nothing to show an agent: protocol control,
 * reactions, polls, keep-in-chat markers, or no text and no media.
 */
export function isNoise(message: WhatsAppMessageContent): boolean {
  if (message.protocolMessage) return true;
  if (message.reactionMessage) return true;
  if (message.pollCreationMessage || message.pollUpdateMessage) return true;
  if (message.keepInChatMessage) return true;

  return extractText(message) === "" && pickMedia(message) === null;
}
