/**
 * Markdown Template Parser
 *
 * Splits a role or beat document into heading sections and collects the
 * fenced code blocks inside each. Only the structure the Actor needs is
 * recognised: ATX headings (`#` to `######`) and ``` fences. Headings inside
 * a fence are treated as text.
 *
 * @example
 * ```typescript
 * const doc = parseTemplate(beatMarkdown);
 * const template = findSection(doc, 'Prompt Template');
 * template?.fencedBlocks[0]; // lines of the first fenced block
 * ```
 */

export interface TemplateSection {
  /** Heading text without the leading #s */
  title: string;
  /** Heading depth, 1 for `#` */
  level: number;
  /** Raw lines between this heading and the next one, fences included */
  lines: string[];
  /** Contents of each fenced block in the section, without the fence lines */
  fencedBlocks: string[][];
}

export interface ParsedTemplate {
  /** Lines before the first heading */
  preamble: string[];
  sections: TemplateSection[];
}

const HEADING_PATTERN = /^(#{1,6})\s+(.*?)\s*#*\s*$/;

function isFence(line: string): boolean {
  return line.trimStart().startsWith('```');
}

export function parseTemplate(markdown: string): ParsedTemplate {
  const result: ParsedTemplate = { preamble: [], sections: [] };
  let current: TemplateSection | null = null;
  let openBlock: string[] | null = null;

  for (const line of markdown.split(/\r?\n/)) {
    if (openBlock === null) {
      const heading = HEADING_PATTERN.exec(line.trim());
      if (heading) {
        current = { title: heading[2], level: heading[1].length, lines: [], fencedBlocks: [] };
        result.sections.push(current);
        continue;
      }
    }

    (current ? current.lines : result.preamble).push(line);

    if (isFence(line)) {
      if (openBlock === null) {
        openBlock = [];
        current?.fencedBlocks.push(openBlock);
      } else {
        openBlock = null;
      }
    } else if (openBlock !== null) {
      openBlock.push(line);
    }
  }

  return result;
}

/**
 * Finds the first section whose title matches, ignoring case and
 * surrounding whitespace.
 */
export function findSection(template: ParsedTemplate, title: string): TemplateSection | undefined {
  const wanted = title.trim().toLowerCase();
  return template.sections.find((section) => section.title.trim().toLowerCase() === wanted);
}
