/**
 * Parser for multi-step migration prompt documents.
 *
 * A prompt document is Markdown where each `# Step <id>` header opens a step.
 * Three reserved headers carry text that is not a step:
 *
 * - `# Introduction`: entry point shown when no step is requested
 * - `# Before`: shown before a step when it is started
 * - `# After`: shown after a step when it is started
 *
 * Only single-`#` headers split sections; `##` sub-headers stay in the
 * content of the section they appear in.
 */

import { InvalidStepIdError, NoStepsFoundError } from '../errors.js';

type ReservedSection = 'introduction' | 'before' | 'after';

type SectionHeader =
  | { kind: 'reserved'; section: ReservedSection }
  | { kind: 'step'; id: string };

const RESERVED_SECTIONS: readonly ReservedSection[] = [
  'introduction',
  'before',
  'after',
];

const STEP_LABEL = /^step +(.*)$/is;

/** IDs that would replace the prototype of the persisted step map. */
const RESERVED_STEP_IDS: ReadonlySet<string> = new Set(['__proto__']);

/**
 * Parse a header line.
 *
 * @returns The header, or null when the line is ordinary content
 */
export function parseHeader(line: string): SectionHeader | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith('#') || trimmed.startsWith('##')) {
    return null;
  }

  // The marker must be followed by whitespace: "#Step 1" is content
  if (!/^#\s/.test(trimmed)) {
    return null;
  }

  const label = trimmed.slice(1).trim();
  if (label === '') {
    return null;
  }

  const lower = label.toLowerCase();
  const reserved = RESERVED_SECTIONS.find((section) => section === lower);
  if (reserved) {
    return { kind: 'reserved', section: reserved };
  }

  const match = STEP_LABEL.exec(label);
  if (!match) {
    return null;
  }
  const id = match[1].trim();
  if (id === '') {
    return null;
  }
  return { kind: 'step', id };
}

/**
 * Drop blank lines from both ends of a section body.
 */
function trimBlankLines(lines: string[]): string {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].trim() === '') {
    start++;
  }
  while (end > start && lines[end - 1].trim() === '') {
    end--;
  }
  return lines.slice(start, end).join('\n');
}

/**
 * A parsed prompt document. Immutable once constructed.
 */
export class MigrationPrompt {
  private readonly stepContent: ReadonlyMap<string, string>;
  private readonly order: readonly string[];
  private readonly sections: Readonly<Record<ReservedSection, string>>;

  constructor(
    stepContent: ReadonlyMap<string, string>,
    order: readonly string[],
    sections: Readonly<Record<ReservedSection, string>>
  ) {
    this.stepContent = stepContent;
    this.order = order;
    this.sections = sections;
  }

  /**
   * Get the content of a step.
   *
   * @returns The step content, or undefined when the document has no such step
   */
  getStep(id: string): string | undefined {
    return this.stepContent.get(id);
  }

  hasStep(id: string): boolean {
    return this.stepContent.has(id);
  }

  /**
   * All step IDs in document order. Returns a copy.
   */
  steps(): string[] {
    return [...this.order];
  }

  firstStep(): string {
    return this.order[0] ?? '';
  }

  introduction(): string {
    return this.sections.introduction;
  }

  before(): string {
    return this.sections.before;
  }

  after(): string {
    return this.sections.after;
  }

  /**
   * The initial instruction handed to an agent driving the workflow.
   *
   * @param command - Command prefix the agent should run, e.g. "waymark migrate"
   * @returns Instruction text, or an empty string when there are no steps
   */
  bootstrap(command: string): string {
    const first = this.firstStep();
    if (first === '') {
      return '';
    }
    return `Execute '${command} ${first}'. This will return instructions. Execute those instructions.`;
  }
}

/**
 * Parse a prompt document into steps and reserved sections.
 *
 * Content before the first header is discarded. A step ID that appears twice
 * keeps its first position and the content of its last occurrence.
 *
 * @param text - Prompt document text
 * @returns Parsed prompt
 * @throws {NoStepsFoundError} If the document has no step header
 * @throws {InvalidStepIdError} If a step header uses a reserved ID
 */
export function parsePrompt(text: string): MigrationPrompt {
  const stepContent = new Map<string, string>();
  const order: string[] = [];
  const sections: Record<ReservedSection, string> = {
    introduction: '',
    before: '',
    after: '',
  };

  let current: SectionHeader | null = null;
  let buffer: string[] = [];

  const flush = (): void => {
    if (current === null) {
      return;
    }
    const content = trimBlankLines(buffer);
    if (current.kind === 'reserved') {
      sections[current.section] = content;
    } else {
      stepContent.set(current.id, content);
    }
  };

  for (const line of text.split(/\r?\n/)) {
    const header = parseHeader(line);
    if (header === null) {
      if (current !== null) {
        buffer.push(line);
      }
      continue;
    }

    if (header.kind === 'step' && RESERVED_STEP_IDS.has(header.id)) {
      throw new InvalidStepIdError(header.id);
    }

    flush();
    current = header;
    buffer = [];
    if (header.kind === 'step' && !order.includes(header.id)) {
      order.push(header.id);
    }
  }
  flush();

  if (order.length === 0) {
    throw new NoStepsFoundError();
  }

  return new MigrationPrompt(stepContent, order, sections);
}
