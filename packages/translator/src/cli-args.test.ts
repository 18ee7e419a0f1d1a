import { describe, it, expect } from 'vitest';
import { documentArgsSchema, resolveOutputPath } from './actions/document.js';
import { glossaryIdArgsSchema } from './actions/glossary.js';
import { textArgsSchema } from './actions/text.js';
import { cliInputSchema, normalizeCommand, parseArgs } from './cli-args.js';

describe('parseArgs', () => {
  it('reads --key=value, --key value and bare flags', () => {
    expect(parseArgs(['text', '--to=DE', '--text', 'Hello world', '--pretty'])).toEqual({
      command: 'text',
      options: { to: 'DE', text: 'Hello world', pretty: 'true' },
    });
  });

  it('keeps equals signs inside values', () => {
    expect(parseArgs(['text', '--text=a=b']).options).toEqual({ text: 'a=b' });
  });

  it('ignores positional arguments', () => {
    expect(parseArgs(['usage', 'extra', '--json']).options).toEqual({ json: 'true' });
  });

  it('falls back to help', () => {
    expect(parseArgs([]).command).toBe('help');
    expect(normalizeCommand('-h')).toBe('help');
    expect(normalizeCommand('--help')).toBe('help');
  });

  it('accepts known commands only', () => {
    expect(cliInputSchema.safeParse({ command: 'glossary-list', options: {} }).success).toBe(true);
    expect(cliInputSchema.safeParse({ command: 'crawl', options: {} }).success).toBe(false);
  });
});

describe('action arguments', () => {
  it('applies defaults to text options', () => {
    const parsed = textArgsSchema.parse({ to: 'DE', text: 'Hello' });

    expect(parsed).toMatchObject({
      to: 'DE',
      text: 'Hello',
      transport: 'axios',
      pretty: false,
      preserveFormatting: false,
    });
    expect(parsed.authKey).toBeUndefined();
  });

  it('reports the first missing option', () => {
    const parsed = textArgsSchema.safeParse({ to: 'DE' });

    expect(parsed.success).toBe(false);
    expect(parsed.success ? undefined : parsed.error.issues[0]?.message).toBe('Missing required option: --text');
  });

  it('rejects unknown transports', () => {
    const parsed = textArgsSchema.safeParse({ to: 'DE', text: 'Hello', transport: 'curl' });

    expect(parsed.success ? undefined : parsed.error.issues[0]?.message).toBe(
      'Invalid --transport. Use axios or fetch.',
    );
  });

  it('parses document timeouts as integers', () => {
    const valid = documentArgsSchema.parse({ to: 'DE', file: 'a.docx', dest: 'out', timeoutMs: '60000' });
    const invalid = documentArgsSchema.safeParse({ to: 'DE', file: 'a.docx', dest: 'out', timeoutMs: 'soon' });

    expect(valid.timeoutMs).toBe(60_000);
    expect(invalid.success ? undefined : invalid.error.issues[0]?.message).toBe(
      'Invalid --timeoutMs. Must be a positive integer.',
    );
  });

  it('requires a glossary ID', () => {
    const parsed = glossaryIdArgsSchema.safeParse({ id: '  ' });

    expect(parsed.success ? undefined : parsed.error.issues[0]?.message).toBe('Missing required option: --id');
  });
});

describe('resolveOutputPath', () => {
  it('keeps the file name or swaps the extension', () => {
    expect(resolveOutputPath('docs/report.docx', 'out')).toBe('out/report.docx');
    expect(resolveOutputPath('docs/report.docx', 'out', 'PDF')).toBe('out/report.pdf');
  });
});
