import { z } from 'zod';
import type { PaperRecord } from '../../pipeline/types';

const scalar = z.union([z.string(), z.number()]).transform((v) => String(v).trim());

export const ScrapedPaperSchema = z.object({
  id: scalar.optional(),
  paper_id: scalar.optional(),
  title: z.string().trim().min(1),
  abstract: z.string().nullish().transform((v) => (v ?? '').trim()),
  authors: z.union([z.array(z.string()), z.string()]).nullish(),
  year: scalar.nullish(),
  venue: z.string().nullish(),
  url: z.string().nullish(),
  metadata: z.record(z.string(), z.unknown()).nullish(),
});

export type ScrapedPaper = z.infer<typeof ScrapedPaperSchema>;

const ScraperResponseSchema = z.union([
  z.object({ papers: z.array(z.unknown()) }),
  z.array(z.unknown()),
]);

export type NormalizeResult =
  | { success: true; papers: PaperRecord[]; dropped: number }
  | { success: false; error: string };

function toMetadata(paper: ScrapedPaper): Record<string, string> {
  const metadata: Record<string, string> = {};

  for (const [key, value] of Object.entries(paper.metadata ?? {})) {
    if (typeof value === 'string' && value.trim()) metadata[key] = value.trim();
    else if (typeof value === 'number') metadata[key] = String(value);
  }

  const authors = Array.isArray(paper.authors)
    ? paper.authors.map((a) => a.trim()).filter(Boolean).join(', ')
    : paper.authors?.trim();
  if (authors) metadata.authors = authors;
  if (paper.year) metadata.year = paper.year;
  if (paper.venue?.trim()) metadata.venue = paper.venue.trim();
  if (paper.url?.trim()) metadata.url = paper.url.trim();

  return metadata;
}

function explicitId(paper: ScrapedPaper): string | undefined {
  return paper.id || paper.paper_id || paper.url?.trim() || undefined;
}

function derivedId(index: number, reserved: ReadonlySet<string>, seen: ReadonlySet<string>): string {
  const base = `paper-${index + 1}`;
  let id = base;
  for (let n = 2; reserved.has(id) || seen.has(id); n++) {
    id = `${base}-${n}`;
  }
  return id;
}

/**
 * Maps the scraper's loosely-typed records onto PaperRecord, keeping their order.
 * Records without a title and repeated ids are dropped, and the list is capped at
 * `maxResults`. Records without an id get `paper-<position>`, suffixed when that
 * collides with an explicit id.
 */
export function normalizeScraperResponse(body: unknown, maxResults: number): NormalizeResult {
  const envelope = ScraperResponseSchema.safeParse(body);
  if (!envelope.success) {
    return { success: false, error: 'expected a paper list or an object with a "papers" array' };
  }
  const records = Array.isArray(envelope.data) ? envelope.data : envelope.data.papers;

  const parsed = records.map((record) => ScrapedPaperSchema.safeParse(record));
  // explicit ids win over derived ones, wherever they appear in the list
  const reserved = new Set<string>();
  for (const result of parsed) {
    const explicit = result.success ? explicitId(result.data) : undefined;
    if (explicit) reserved.add(explicit);
  }

  const papers: PaperRecord[] = [];
  const seen = new Set<string>();
  let dropped = 0;

  for (const [index, result] of parsed.entries()) {
    if (papers.length >= maxResults) break;
    if (!result.success) {
      dropped++;
      continue;
    }
    const paper = result.data;
    const id = explicitId(paper) ?? derivedId(index, reserved, seen);
    if (seen.has(id)) {
      dropped++;
      continue;
    }
    seen.add(id);
    papers.push({
      id,
      title: paper.title,
      abstract: paper.abstract,
      metadata: toMetadata(paper),
    });
  }

  return { success: true, papers, dropped };
}
