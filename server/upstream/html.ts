import * as cheerio from "cheerio";

export interface OptionEntry {
  value: string;
  text: string;
}

export interface HtmlResultRow {
  /** Header labels of the table the row belongs to, or null for header-less tables. */
  headers: string[] | null;
  cells: string[];
  link: string | null;
}

export interface HtmlResultPage {
  rows: HtmlResultRow[];
  total: number | null;
}

export function normalizeText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

const PLACEHOLDER_OPTION = /^(?:-+\s*)?(?:select|choose)\b/i;
const TOTAL_PATTERN = /total\s*(?:records|results|cases)?\s*:?\s*(\d[\d,]*)/i;

/**
 * Reads `<option>` elements for the first selector that yields any, skipping
 * blank values and "Select ..." placeholders.
 */
export function extractOptions(html: string, selectors: readonly string[]): OptionEntry[] {
  const $ = cheerio.load(html);

  for (const selector of selectors) {
    const options: OptionEntry[] = [];
    $(selector).each((_, el) => {
      const value = normalizeText($(el).attr("value") ?? "");
      const text = normalizeText($(el).text());
      if (!value || !text || PLACEHOLDER_OPTION.test(text)) return;
      options.push({ value, text });
    });
    if (options.length > 0) return options;
  }

  return [];
}

export function extractResultPage(html: string): HtmlResultPage {
  const $ = cheerio.load(html);
  const preferred = $("table#results");
  const table = preferred.length > 0 ? preferred.first() : $("table").first();

  const rows: HtmlResultRow[] = [];
  let headers: string[] | null = null;

  table.find("tr").each((_, tr) => {
    const row = $(tr);
    const headerCells = row.find("th");
    if (headerCells.length > 0 && row.find("td").length === 0) {
      headers = headerCells.map((__, th) => normalizeText($(th).text())).get();
      return;
    }

    const cells = row.find("td").map((__, td) => normalizeText($(td).text())).get();
    if (cells.length === 0) return;

    const href = row.find("a[href]").first().attr("href");
    rows.push({ headers, cells, link: href ? href.trim() : null });
  });

  const match = TOTAL_PATTERN.exec(normalizeText($.root().text()));
  const total = match ? Number.parseInt(match[1].replace(/,/g, ""), 10) : null;

  return { rows, total: total !== null && Number.isFinite(total) ? total : null };
}
