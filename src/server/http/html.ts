/**
 * HTML Utilities
 *
 * Common HTML processing used by the archiver: body decoding, text
 * extraction and sanitization.
 */

import DOMPurify, { type DOMPurify as DOMPurifyInstance } from "dompurify";
import { JSDOM } from "jsdom";
import { parseHTML } from "linkedom";

/**
 * Elements dropped on top of DOMPurify's defaults. Archived content is
 * rendered as a read-only document, so embeds and form controls go too.
 */
const FORBID_TAGS = ["style", "script", "form", "input", "button", "select", "textarea"];

const UNSAFE_STYLE = /expression\s*\(|url\s*\(\s*['"]?\s*javascript:/i;

let purifier: DOMPurifyInstance | null = null;

/**
 * DOMPurify bound to a jsdom window, created on first use.
 */
function getPurifier(): DOMPurifyInstance {
  if (!purifier) {
    purifier = DOMPurify(new JSDOM("").window);
    // DOMPurify keeps style attributes without looking at their values
    purifier.addHook("uponSanitizeAttribute", (_node, data) => {
      if (data.attrName === "style" && UNSAFE_STYLE.test(data.attrValue)) {
        data.keepAttr = false;
      }
    });
  }
  return purifier;
}

function toDocument(html: string) {
  // linkedom needs a full document structure
  const trimmedHtml = html.trim().toLowerCase();
  const isFullDocument = trimmedHtml.startsWith("<!doctype") || trimmedHtml.startsWith("<html");
  const htmlToParse = isFullDocument ? html : `<!DOCTYPE html><html><body>${html}</body></html>`;
  return parseHTML(htmlToParse).document;
}

/** Leading bytes searched for a `<meta>` charset declaration. */
const META_CHARSET_SCAN_BYTES = 1024;

const CHARSET_PARAM = /charset\s*=\s*["']?([\w.:-]+)/i;

const META_CHARSET = /<meta\b[^>]*?\bcharset\s*=\s*["']?([\w.:-]+)/i;

/**
 * Decodes a response body. The charset comes from the Content-Type header,
 * then from a `<meta charset>` or `<meta http-equiv="Content-Type">` near the
 * start of the document, falling back to UTF-8 for missing or unknown ones.
 */
export function decodeBody(body: Buffer, contentType: string): string {
  const charset =
    CHARSET_PARAM.exec(contentType)?.[1] ??
    META_CHARSET.exec(body.subarray(0, META_CHARSET_SCAN_BYTES).toString("latin1"))?.[1];

  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset?.toLowerCase() ?? "utf-8");
  } catch {
    decoder = new TextDecoder("utf-8");
  }
  return decoder.decode(body);
}

/**
 * Extracts plain text from HTML content.
 *
 * Uses linkedom for proper parsing rather than regex, which correctly
 * handles nested tags, script/style content, and entity decoding.
 * Whitespace runs collapse to single spaces.
 */
export function extractTextFromHtml(html: string): string {
  if (!html || !html.trim()) {
    return "";
  }

  const document = toDocument(html);

  for (const el of document.querySelectorAll("script, style, noscript, template")) {
    el.remove();
  }

  return (document.body?.textContent || document.documentElement?.textContent || "")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Removes script-capable markup from an HTML fragment with DOMPurify:
 * scripts, embeds, forms, event handlers, SVG animation and
 * javascript:/vbscript:/non-image data: URLs.
 *
 * @returns the sanitized fragment (body inner HTML)
 */
export function sanitizeHtml(html: string): string {
  if (!html || !html.trim()) {
    return "";
  }

  return getPurifier()
    .sanitize(html, {
      FORBID_TAGS,
      FORBID_ATTR: ["srcdoc", "formaction"],
    })
    .trim();
}
