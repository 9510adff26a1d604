/**
 * Content Extractor
 *
 * Turns a fetched HTML page into the fields stored on an archive:
 *
 * - Metadata from <head> (OpenGraph, Twitter Card, <title>, meta description,
 *   canonical link), read with a streaming htmlparser2 pass that stops at </head>
 * - Main content via Readability, sanitized before storage
 * - Plain text of the main content, or of the whole body when Readability
 *   finds no article
 */

import { Parser } from "htmlparser2";

import { resolveHttpUrl } from "@/lib/url";
import { extractTextFromHtml, sanitizeHtml } from "../http/html";
import { cleanContent } from "./content-cleaner";

export const MAX_TITLE_LENGTH = 500;
export const MAX_IMAGE_URL_LENGTH = 2048;

/**
 * Metadata map stored in content_archives.metadata. Absent keys are omitted.
 */
export interface ArchiveMetadata {
  content_type: string;
  final_url: string;
  canonical_url?: string;
  site_name?: string;
  author?: string;
  opengraph?: Record<string, string>;
  twitter?: Record<string, string>;
  [key: string]: unknown;
}

export interface ExtractedContent {
  title: string | null;
  description: string | null;
  /** Sanitized article HTML; null when no article was found */
  contentHtml: string | null;
  contentText: string;
  imageUrl: string | null;
  metadata: ArchiveMetadata;
}

export interface ExtractContentInput {
  html: string;
  /** Final URL of the page, used to resolve relative URLs */
  url: string;
}

interface HeadMetadata {
  title: string | null;
  metaDescription: string | null;
  canonicalHref: string | null;
  author: string | null;
  opengraph: Record<string, string>;
  twitter: Record<string, string>;
}

/**
 * Reads metadata from the document head.
 * First occurrence wins for repeated tags.
 */
export function extractHeadMetadata(html: string): HeadMetadata {
  const result: HeadMetadata = {
    title: null,
    metaDescription: null,
    canonicalHref: null,
    author: null,
    opengraph: {},
    twitter: {},
  };

  let inTitle = false;
  let titleContent = "";

  const parser = new Parser(
    {
      onopentag(name, attribs) {
        if (name === "title") {
          inTitle = true;
          titleContent = "";
        } else if (name === "meta") {
          const key = (attribs.property ?? attribs.name)?.trim().toLowerCase();
          const content = attribs.content?.trim();
          if (!key || !content) return;

          if (key.startsWith("og:")) {
            const ogKey = key.slice(3);
            result.opengraph[ogKey] ??= content;
          } else if (key.startsWith("twitter:")) {
            const twitterKey = key.slice(8);
            result.twitter[twitterKey] ??= content;
          } else if (key === "description") {
            result.metaDescription ??= content;
          } else if (key === "author" || key === "article:author") {
            result.author ??= content;
          }
        } else if (name === "link") {
          const rel = attribs.rel?.toLowerCase().split(/\s+/) ?? [];
          if (rel.includes("canonical") && attribs.href) {
            result.canonicalHref ??= attribs.href.trim();
          }
        }
      },
      ontext(text) {
        if (inTitle) {
          titleContent += text;
        }
      },
      onclosetag(name) {
        if (name === "title") {
          inTitle = false;
          const title = titleContent.replace(/\s+/g, " ").trim();
          if (title) {
            result.title ??= title;
          }
        } else if (name === "head") {
          parser.pause();
        }
      },
    },
    { decodeEntities: true, lowerCaseTags: true, lowerCaseAttributeNames: true }
  );

  parser.write(html);
  parser.end();

  return result;
}

function truncate(value: string | null, maxLength: number): string | null {
  if (value === null) return null;
  return value.length > maxLength ? value.slice(0, maxLength) : value;
}

function resolveImageUrl(value: string | undefined, base: string): string | null {
  if (!value) return null;
  const resolved = resolveHttpUrl(value, base);
  // A cut-off URL would point somewhere else, so overlong ones are dropped
  if (!resolved || resolved.length > MAX_IMAGE_URL_LENGTH) return null;
  return resolved;
}

/**
 * Extracts archive fields from an HTML page. Never throws on malformed
 * markup; an empty page yields empty text and null fields.
 */
export function extractContent(input: ExtractContentInput): ExtractedContent {
  const { html, url } = input;
  const head = extractHeadMetadata(html);
  const cleaned = cleanContent(html, { url });

  const title =
    head.opengraph.title || head.twitter.title || head.title || cleaned?.title || null;
  const description =
    head.opengraph.description || head.twitter.description || head.metaDescription || null;
  const imageUrl =
    resolveImageUrl(head.opengraph.image, url) ?? resolveImageUrl(head.twitter.image, url);

  const contentHtml = cleaned ? sanitizeHtml(cleaned.content) || null : null;
  const contentText = contentHtml ? extractTextFromHtml(contentHtml) : extractTextFromHtml(html);

  const metadata: ArchiveMetadata = { content_type: "html", final_url: url };
  const canonicalUrl = head.canonicalHref ? resolveHttpUrl(head.canonicalHref, url) : null;
  if (canonicalUrl) metadata.canonical_url = canonicalUrl;
  const siteName = head.opengraph.site_name || cleaned?.siteName;
  if (siteName) metadata.site_name = siteName;
  const author = head.author || cleaned?.byline;
  if (author) metadata.author = author;
  if (Object.keys(head.opengraph).length > 0) metadata.opengraph = head.opengraph;
  if (Object.keys(head.twitter).length > 0) metadata.twitter = head.twitter;

  return {
    title: truncate(title, MAX_TITLE_LENGTH),
    description,
    contentHtml,
    contentText,
    imageUrl,
    metadata,
  };
}
