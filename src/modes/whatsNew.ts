import { decodeText, getResponse } from "../core/session";
import { findAllTags, findTag, parseHtml, resolveUrl } from "../crawl";
import { ModeResult, Row } from "../types";
import { fatal, ModeDependencies, skipped } from "./types";

export const WHATS_NEW_HEADER: Row = ["Link to article", "Title", "Editor, Author"];

export async function whatsNew(deps: ModeDependencies): Promise<ModeResult> {
  const { config, logger, session } = deps;
  const whatsNewUrl = resolveUrl(config.mainDocUrl, "whatsnew/");
  const response = await getResponse(session, whatsNewUrl, logger);
  if (!response) {
    return skipped(whatsNewUrl);
  }

  const $ = parseHtml(decodeText(response));
  const mainSection = findTag($.root(), "section", { id: "what-s-new-in-python" });
  if (!mainSection.ok) {
    return fatal(mainSection.error);
  }
  const toctree = findTag(mainSection.value, "div", { class: "toctree-wrapper" });
  if (!toctree.ok) {
    return fatal(toctree.error);
  }

  const sections = findAllTags(toctree.value, "li", { class: "toctree-l1" }).toArray();
  const rows: Row[] = [WHATS_NEW_HEADER];

  for (const [index, section] of sections.entries()) {
    logger.info("whats_new_progress", { current: index + 1, total: sections.length });

    const anchor = findTag($(section), "a");
    if (!anchor.ok) {
      return fatal(anchor.error);
    }
    const href = anchor.value.attr("href");
    if (!href) {
      logger.warn("whats_new_link_missing", { current: index + 1, text: anchor.value.text() });
      continue;
    }

    const articleUrl = resolveUrl(whatsNewUrl, href);
    const article = await getResponse(session, articleUrl, logger);
    if (!article) {
      continue;
    }

    const $article = parseHtml(decodeText(article));
    const heading = findTag($article.root(), "h1");
    if (!heading.ok) {
      return fatal(heading.error);
    }
    const authors = findTag($article.root(), "dl");
    if (!authors.ok) {
      return fatal(authors.error);
    }

    rows.push([articleUrl, heading.value.text(), authors.value.text().replace(/\n/g, " ")]);
  }

  return { status: "ok", rows };
}
