/**
 * Locating "learnings" sections in reconstructed transcript text
 */

const LEARNINGS_HEADER =
  /^#{2,3}\s+(?:Aprendizajes(?:\s+Clave)?|Key\s+Learnings?|Learnings?):?\s*$/gim;

const NEXT_HEADER = /\n#{1,3} /;

export interface LearningSection {
  /** The matched header line. */
  header: string;
  /** Offset of the header in the source text. */
  start: number;
  /** Section text after the header, up to the next header of level 1-3. */
  body: string;
}

/**
 * Every recognised learnings section, in document order.
 */
export function findLearningSections(text: string): LearningSection[] {
  const sections: LearningSection[] = [];
  for (const match of text.matchAll(new RegExp(LEARNINGS_HEADER))) {
    const start = match.index ?? 0;
    let body = text.slice(start + match[0].length);
    const next = NEXT_HEADER.exec(body);
    if (next) body = body.slice(0, next.index);
    sections.push({ header: match[0].trim(), start, body });
  }
  return sections;
}

/**
 * Walk the sections from the most recent backwards and return the first
 * non-empty parse. Older sections are only consulted when every newer one
 * parses to nothing.
 */
export function locateLearnings<T>(
  text: string,
  parse: (body: string) => T[],
): { section: LearningSection; items: T[] } | null {
  const sections = findLearningSections(text);
  for (let i = sections.length - 1; i >= 0; i -= 1) {
    const items = parse(sections[i].body);
    if (items.length > 0) return { section: sections[i], items };
  }
  return null;
}
