/**
 * Tests for the migration prompt parser.
 */

import { InvalidStepIdError, NoStepsFoundError } from '../../errors.js';
import { parseHeader, parsePrompt } from '../../prompt/prompt-parser.js';

describe('parseHeader', () => {
  it('recognizes step headers and keeps the id verbatim', () => {
    expect(parseHeader('# Step 1')).toEqual({ kind: 'step', id: '1' });
    expect(parseHeader('# step Find Tests')).toEqual({
      kind: 'step',
      id: 'Find Tests',
    });
    expect(parseHeader('   # Step 2  ')).toEqual({ kind: 'step', id: '2' });
  });

  it('recognizes reserved sections case-insensitively', () => {
    expect(parseHeader('# Introduction')).toEqual({
      kind: 'reserved',
      section: 'introduction',
    });
    expect(parseHeader('# BEFORE')).toEqual({
      kind: 'reserved',
      section: 'before',
    });
    expect(parseHeader('# after')).toEqual({
      kind: 'reserved',
      section: 'after',
    });
  });

  it.each([
    ['sub-header', '## Step 1'],
    ['no space after marker', '##Step 1'],
    ['marker glued to label', '#Step 1'],
    ['plural label', '# Steps 3'],
    ['missing id', '# Step'],
    ['whitespace-only id', '# Step    '],
    ['other label', '# Notes'],
    ['bare marker', '#'],
    ['plain text', 'Step 1'],
  ])('ignores %s', (_label, line) => {
    expect(parseHeader(line)).toBeNull();
  });
});

describe('parsePrompt', () => {
  it('yields steps in document order, not sorted', () => {
    const prompt = parsePrompt(
      ['# Step 10', 'ten', '# Step 2', 'two', '# Step b', 'bee'].join('\n')
    );

    expect(prompt.steps()).toEqual(['10', '2', 'b']);
    expect(prompt.firstStep()).toBe('10');
    expect(prompt.getStep('2')).toBe('two');
  });

  it('trims blank lines around section content and keeps inner ones', () => {
    const prompt = parsePrompt(
      ['# Step 1', '', '', 'line one', '', 'line two', '', ''].join('\n')
    );

    expect(prompt.getStep('1')).toBe('line one\n\nline two');
  });

  it('keeps sub-headers inside the open section', () => {
    const prompt = parsePrompt(
      ['# Step 1', '## Details', 'text', '##Step 9'].join('\n')
    );

    expect(prompt.steps()).toEqual(['1']);
    expect(prompt.getStep('1')).toBe('## Details\ntext\n##Step 9');
  });

  it('separates reserved sections from steps', () => {
    const prompt = parsePrompt(
      [
        'preamble that is dropped',
        '# Introduction',
        'Welcome',
        '# Before',
        'Read first',
        '# Step 1',
        'Do it',
        '# After',
        'Record it',
      ].join('\n')
    );

    expect(prompt.introduction()).toBe('Welcome');
    expect(prompt.before()).toBe('Read first');
    expect(prompt.after()).toBe('Record it');
    expect(prompt.steps()).toEqual(['1']);
    expect(prompt.getStep('1')).toBe('Do it');
  });

  it('returns empty strings for absent reserved sections', () => {
    const prompt = parsePrompt('# Step 1\nonly step');

    expect(prompt.introduction()).toBe('');
    expect(prompt.before()).toBe('');
    expect(prompt.after()).toBe('');
  });

  it('treats an invalid step header as content of the open section', () => {
    const prompt = parsePrompt(['# Step 1', 'a', '# Step   ', 'b'].join('\n'));

    expect(prompt.steps()).toEqual(['1']);
    expect(prompt.getStep('1')).toBe('a\n# Step   \nb');
  });

  it('handles CRLF line endings', () => {
    const prompt = parsePrompt('# Step 1\r\nfirst\r\n# Step 2\r\nsecond\r\n');

    expect(prompt.getStep('1')).toBe('first');
    expect(prompt.getStep('2')).toBe('second');
  });

  it('returns a defensive copy of the step list', () => {
    const prompt = parsePrompt('# Step 1\n# Step 2');

    const steps = prompt.steps();
    steps.push('3');
    steps[0] = 'changed';

    expect(prompt.steps()).toEqual(['1', '2']);
  });

  it('reports missing steps without throwing', () => {
    const prompt = parsePrompt('# Step 1\ncontent');

    expect(prompt.getStep('9')).toBeUndefined();
    expect(prompt.hasStep('9')).toBe(false);
    expect(prompt.hasStep('1')).toBe(true);
  });

  it('keeps the first position and last content of a repeated step', () => {
    const prompt = parsePrompt(
      ['# Step 1', 'old', '# Step 2', 'two', '# Step 1', 'new'].join('\n')
    );

    expect(prompt.steps()).toEqual(['1', '2']);
    expect(prompt.getStep('1')).toBe('new');
  });

  it.each([
    ['empty text', ''],
    ['no headers', 'just some text\nmore text'],
    ['reserved sections only', '# Introduction\nhi\n# Before\nx'],
    ['invalid step headers only', '## Step 1\n# Steps 2\n# Step'],
  ])('fails with no steps found for %s', (_label, text) => {
    expect(() => parsePrompt(text)).toThrow(NoStepsFoundError);
    expect(() => parsePrompt(text)).toThrow('no steps found');
  });

  it('rejects a step id that would replace the step map prototype', () => {
    const text = '# Step __proto__\nhello\n# Step 2\nx';

    expect(() => parsePrompt(text)).toThrow(InvalidStepIdError);
    expect(() => parsePrompt(text)).toThrow("step id '__proto__' is reserved");
  });

  it('accepts ids that only shadow inherited names', () => {
    const prompt = parsePrompt('# Step constructor\nbuild\n# Step toString');

    expect(prompt.steps()).toEqual(['constructor', 'toString']);
    expect(prompt.getStep('constructor')).toBe('build');
  });

  describe('bootstrap', () => {
    it('tells the agent to run the first step', () => {
      const prompt = parsePrompt('# Step setup\nx\n# Step 2\ny');

      expect(prompt.bootstrap('waymark migrate')).toBe(
        "Execute 'waymark migrate setup'. This will return instructions. Execute those instructions."
      );
    });
  });
});
