import { describe, it, expect } from "vitest";
import type { WhatsAppMessageContent } from "../whatsapp.js";
import { extractMedia, extractText, isNoise } from "./messageContent.js";

describe("isNoise", () => {
  const noise: Array<[string, WhatsAppMessageContent]> = [
    ["protocol message", { protocolMessage: { type: 0 } }],
    ["reaction", { reactionMessage: { text: "👍" } }],
    ["poll creation", { pollCreationMessage: { name: "Lunch?" } }],
    ["poll update", { pollUpdateMessage: { vote: {} } }],
    ["keep-in-chat", { keepInChatMessage: {} }],
    ["empty content", {}],
    ["empty text", { conversation: "" }],
  ];

  it.each(noise)("filters %s", (_label, message) => {
    expect(isNoise(message)).toBe(true);
  });

  it("keeps text and media", () => {
    expect(isNoise({ conversation: "Hello" })).toBe(false);
    expect(isNoise({ extendedTextMessage: { text: "Hi" } })).toBe(false);
    expect(isNoise({ imageMessage: { mimetype: "image/jpeg" } })).toBe(false);
  });
});

describe("extractText", () => {
  it("prefers the plain conversation field", () => {
    expect(extractText({ conversation: "Hello", extendedTextMessage: { text: "Other" } })).toBe("Hello");
    expect(extractText({ extendedTextMessage: { text: "Quoted reply" } })).toBe("Quoted reply");
  });
});

describe("extractMedia", () => {
  it("returns null without media", () => {
    expect(extractMedia({ conversation: "Hello" }, "ABC")).toBeNull();
  });

  it("names images by mime type", () => {
    expect(extractMedia({ imageMessage: { mimetype: "image/png", caption: "look" } }, "ABC")).toEqual({
      kind: "image",
      media: { mimetype: "image/png", caption: "look" },
      mimeType: "image/png",
      fileName: "ABC.png",
      caption: "look",
    });
    expect(extractMedia({ imageMessage: {} }, "ABC")?.fileName).toBe("ABC.jpg");
  });

  it("keeps a document's own file name", () => {
    const media = extractMedia({ documentMessage: { fileName: "invoice.pdf", mimetype: "application/pdf" } }, "ABC");
    expect(media?.fileName).toBe("invoice.pdf");
    expect(extractMedia({ documentMessage: {} }, "ABC")?.fileName).toBe("ABC.pdf");
  });

  it("drops captions on audio and stickers", () => {
    const audio = extractMedia({ audioMessage: { caption: "ignored" } }, "ABC");
    expect(audio?.caption).toBe("");
    expect(audio?.mimeType).toBe("audio/ogg");
    expect(audio?.fileName).toBe("ABC.ogg");
    expect(extractMedia({ stickerMessage: {} }, "ABC")?.fileName).toBe("ABC.webp");
  });

  it("picks image before video", () => {
    expect(extractMedia({ videoMessage: {}, imageMessage: {} }, "ABC")?.kind).toBe("image");
  });
});
