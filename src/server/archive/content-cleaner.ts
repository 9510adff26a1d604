/**
 * Main-content extraction using Mozilla Readability.
 *
 * Readability removes navigation, ads and other page chrome and returns the
 * article body. Its output still comes from untrusted markup, so callers run
 * it through sanitizeHtml before storing it.
 */

import { Readability } from "@mozilla/readability";
import { JSDOM, VirtualConsole } from "jsdom";

import { logger } from "@/lib/logger";

export interface CleanedContent {
  /** Article HTML as returned by Readability (unsanitized) */
  content: string;
  /** Plain text of the article */
  textContent: string;
  excerpt: string | null;
  title: string | null;
  byline: string | null;
  siteName: string | null;
}

export interface CleanContentOptions {
  /** Page URL, used to resolve relative links */
  url: string;
  /** Minimum article text length for a usable result (default 50) */
  minCleanedLength?: number;
}

/**
 * Runs Readability over a full HTML document.
 *
 * @returns the article, or null when Readability finds nothing usable
 */
export function cleanContent(html: string, options: CleanContentOptions): CleanedContent | null {
  const { url, minCleanedLength = 50 } = options;

  if (!html.trim()) {
    return null;
  }

  // Stylesheet parse errors on arbitrary pages are noise
  const virtualConsole = new VirtualConsole();

  // External resources are never loaded; scripts never run
  const dom = new JSDOM(html, { url, virtualConsole });

  try {
    const reader = new Readability(dom.window.document, {
      keepClasses: false,
      charThreshold: 100,
    });

    const article = reader.parse();
    if (!article || !article.content || article.content.trim().length === 0) {
      logger.debug("Readability found no article", { url });
      return null;
    }

    const textContent = article.textContent?.trim() ?? "";
    if (textContent.length < minCleanedLength) {
      logger.debug("Readability extracted content too short", {
        url,
        textLength: textContent.length,
        minCleanedLength,
      });
      return null;
    }

    return {
      content: article.content,
      textContent,
      excerpt: article.excerpt || null,
      title: article.title || null,
      byline: article.byline || null,
      siteName: article.siteName || null,
    };
  } finally {
    dom.window.close();
  }
}
