import { basename } from 'node:path';

/**
 * Directory name for a document's artifacts: the file name without
 * directories and without a trailing `.pdf` (any case).
 *
 * @example
 * documentStem('reports/Annual.PDF'); // 'Annual'
 */
export function documentStem(sourceName: string): string {
  const name = basename(sourceName.replace(/\\/g, '/'));
  const stem = name.replace(/\.pdf$/i, '');
  return stem.length > 0 && stem !== '.' && stem !== '..' ? stem : 'document';
}

/**
 * One output stem per document, in input order. The first document with a
 * stem keeps it; later ones get `-2`, `-3`, ... skipping every stem already
 * in the batch. Stems are compared case-insensitively.
 *
 * @example
 * assignOutputStems(['a/report.pdf', 'b/report.pdf']); // ['report', 'report-2']
 */
export function assignOutputStems(sourceNames: readonly string[]): string[] {
  const stems = sourceNames.map(documentStem);
  const taken = new Set(stems.map((stem) => stem.toLowerCase()));
  const assigned = new Set<string>();

  return stems.map((stem) => {
    if (!assigned.has(stem.toLowerCase())) {
      assigned.add(stem.toLowerCase());
      return stem;
    }

    let suffix = 2;
    while (taken.has(`${stem}-${suffix}`.toLowerCase())) suffix++;
    const unique = `${stem}-${suffix}`;
    taken.add(unique.toLowerCase());
    return unique;
  });
}

/** `image_p<page>_<seq>.png`, both indices 1-based */
export function imageFilename(pageIndex: number, sequenceIndex: number): string {
  return `image_p${pageIndex}_${sequenceIndex}.png`;
}
