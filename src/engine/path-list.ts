/**
 * Path-list variable composition (PATH, PYTHONPATH, LD_LIBRARY_PATH, ...).
 *
 * Values are ordered, de-duplicated segment lists joined by a separator.
 * Appending never clobbers earlier segments.
 */

/** Split a path-list value into its non-empty segments. */
export function splitPathList(value: string | undefined, separator: string): string[] {
  if (!value) return [];
  return value.split(separator).filter((segment) => segment.length > 0);
}

/** Join segments, dropping empties and repeated segments (first occurrence wins). */
export function joinPathList(segments: string[], separator: string): string {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const segment of segments) {
    if (segment.length === 0 || seen.has(segment)) continue;
    seen.add(segment);
    result.push(segment);
  }
  return result.join(separator);
}

/**
 * Position check for a segment: present, and when `after` is given, `after`
 * is present and comes first.
 */
export function segmentSatisfied(
  value: string | undefined,
  segment: string,
  separator: string,
  after?: string,
): boolean {
  const segments = splitPathList(value, separator);
  const position = segments.indexOf(segment);
  if (position === -1) return false;
  if (after === undefined) return true;
  const anchor = segments.indexOf(after);
  return anchor !== -1 && anchor < position;
}

/**
 * Append a segment to a path-list value.
 *
 * An already satisfied segment leaves the value as it is (apart from
 * de-duplication). A segment present but ahead of its `after` anchor is moved
 * to the end.
 */
export function appendSegment(
  value: string | undefined,
  segment: string,
  separator: string,
  after?: string,
): string {
  const segments = splitPathList(value, separator);
  if (segmentSatisfied(value, segment, separator, after)) {
    return joinPathList(segments, separator);
  }
  return joinPathList([...segments.filter((s) => s !== segment), segment], separator);
}
