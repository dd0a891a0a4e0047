import { SourceMapGenerator } from 'source-map';
import { formatIRPath } from '../../types';
import { PrinterMark } from '../../formatter/printer';
import { IRListing } from '../../formatter';

/**
 * Maps each generated line that starts a declaration, member or statement
 * to the line of the same node in the module's IR listing. The listing is
 * embedded as the map's only source.
 */
export function buildSourceMap(
  file: string,
  sourceName: string,
  marks: readonly PrinterMark[],
  listing: IRListing
): string {
  const generator = new SourceMapGenerator({ file });
  generator.setSourceContent(sourceName, listing.text);
  const mappedLines = new Set<number>();
  for (const mark of marks) {
    const original = listing.lines.get(formatIRPath(mark.path));
    // one mapping per generated line: the outermost node starting there
    if (original === undefined || mappedLines.has(mark.line)) {
      continue;
    }
    mappedLines.add(mark.line);
    generator.addMapping({
      generated: { line: mark.line, column: 0 },
      original: { line: original, column: 0 },
      source: sourceName
    });
  }
  return generator.toString();
}

// The file name a listing is stored under inside a source map
export function listingSourceName(moduleName: string): string {
  return `${moduleName}.ir`;
}
