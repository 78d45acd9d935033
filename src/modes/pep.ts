import type { Cheerio } from "cheerio";
import type { Element } from "domhandler";
import { ExpectedStatusRegistry } from "../config";
import { decodeText, getResponse } from "../core/session";
import { findAllTags, findTag, parseHtml, readDefinition, resolveUrl } from "../crawl";
import { Logger } from "../observability";
import { ModeResult, Row } from "../types";
import { fatal, ModeDependencies, skipped } from "./types";

export const PEP_HEADER: Row = ["Status", "Quantity"];

const NUMERIC_CELL = /^\d+$/;

export function flattenRegistry(registry: ExpectedStatusRegistry): Set<string> {
  return new Set(Object.values(registry).flat());
}

export function tallyStatuses(statuses: Iterable<string>): Map<string, number> {
  const tally = new Map<string, number>();
  for (const status of statuses) {
    tally.set(status, (tally.get(status) ?? 0) + 1);
  }
  return tally;
}

export function summarizeStatuses(tally: ReadonlyMap<string, number>, registry: ExpectedStatusRegistry, logger: Logger): Row[] {
  const accepted = flattenRegistry(registry);
  const rows: Row[] = [PEP_HEADER];
  let total = 0;

  for (const [status, count] of tally) {
    if (!accepted.has(status)) {
      logger.warn("pep_status_unexpected", { status, count, expected: [...accepted] });
      continue;
    }
    rows.push([status, count]);
    total += count;
  }

  rows.push(["Total", total]);
  return rows;
}

// "SF" -> "F"; undefined when the row has no abbreviation cell before the number
function previewStatusKey(cell: Cheerio<Element>): string | undefined {
  const firstCell = cell.closest("tr").children("td").first();
  if (firstCell.length === 0 || firstCell.get(0) === cell.get(0)) {
    return undefined;
  }
  return firstCell.text().trim().slice(1);
}

export async function pep(deps: ModeDependencies): Promise<ModeResult> {
  const { config, logger, session } = deps;
  const response = await getResponse(session, config.pepUrl, logger);
  if (!response) {
    return skipped(config.pepUrl);
  }

  const $ = parseHtml(decodeText(response));
  const numericalIndex = findTag($.root(), "section", { id: "numerical-index" });
  if (!numericalIndex.ok) {
    return fatal(numericalIndex.error);
  }
  const tableBody = findTag(numericalIndex.value, "tbody");
  if (!tableBody.ok) {
    return fatal(tableBody.error);
  }

  const numberCells = findAllTags(tableBody.value, "td")
    .toArray()
    .map((cell) => $(cell))
    .filter((cell) => NUMERIC_CELL.test(cell.text().trim()));

  const statuses: string[] = [];
  for (const [index, cell] of numberCells.entries()) {
    logger.info("pep_progress", { current: index + 1, total: numberCells.length });

    const anchor = findTag(cell, "a");
    if (!anchor.ok) {
      return fatal(anchor.error);
    }
    const href = anchor.value.attr("href");
    if (!href) {
      logger.warn("pep_link_missing", { pep: cell.text().trim() });
      continue;
    }

    const cardUrl = resolveUrl(config.pepUrl, href);
    const card = await getResponse(session, cardUrl, logger);
    if (!card) {
      continue;
    }

    const $card = parseHtml(decodeText(card));
    const fields = findTag($card.root(), "dl", { class: "rfc2822 field-list simple" });
    if (!fields.ok) {
      return fatal(fields.error);
    }
    const cardStatus = readDefinition(fields.value, "Status");
    if (cardStatus === undefined) {
      logger.warn("pep_status_missing", { url: cardUrl });
      continue;
    }

    const key = previewStatusKey(cell);
    if (key !== undefined) {
      const expected = config.expectedStatus[key] ?? [];
      if (!expected.includes(cardStatus)) {
        logger.warn("pep_status_mismatch", { url: cardUrl, cardStatus, previewKey: key, expected });
      }
    }

    statuses.push(cardStatus);
  }

  return { status: "ok", rows: summarizeStatuses(tallyStatuses(statuses), config.expectedStatus, logger) };
}
