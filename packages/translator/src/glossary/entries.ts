export type GlossaryEntries = Record<string, string>;

// Terms may not contain C0/C1 control characters or Unicode line/paragraph separators
const INVALID_TERM_PATTERN = /[\u0000-\u001f\u007f-\u009f\u2028\u2029]/u;

export function validateGlossaryTerm(term: string): void {
  if (term.length === 0) {
    throw new Error(`Term "${term}" is not a valid string`);
  }

  if (term !== term.trim()) {
    throw new Error(`Term "${term}" contains leading or trailing whitespace`);
  }

  if (INVALID_TERM_PATTERN.test(term)) {
    throw new Error(`Term "${term}" contains invalid character`);
  }
}

/**
 * Parses glossary entries, one `source<separator>target` pair per line.
 * Blank lines are skipped; duplicate source terms are rejected.
 */
export function convertTsvToDict(content: string, separator = '\t'): GlossaryEntries {
  const entries: GlossaryEntries = {};
  const lines = content.split(/\r\n|\n|\r/);

  lines.forEach((line, index) => {
    const lineNumber = index + 1;
    const trimmed = line.trim();
    if (trimmed.length === 0) {
      return;
    }

    const separatorIndex = trimmed.indexOf(separator);
    if (separatorIndex === -1) {
      throw new Error(`Entry ${lineNumber} does not contain separator: ${line}`);
    }

    const source = trimmed.slice(0, separatorIndex).trim();
    const target = trimmed.slice(separatorIndex + separator.length).trim();
    if (target.includes(separator)) {
      throw new Error(`Entry ${lineNumber} contains more than one term separator: ${line}`);
    }

    validateGlossaryTerm(source);
    validateGlossaryTerm(target);

    if (Object.hasOwn(entries, source)) {
      throw new Error(`Entry ${lineNumber} duplicates source term "${source}"`);
    }

    entries[source] = target;
  });

  return entries;
}

export function convertDictToTsv(entries: GlossaryEntries): string {
  return Object.entries(entries)
    .map(([source, target]) => {
      validateGlossaryTerm(source);
      validateGlossaryTerm(target);
      return `${source}\t${target}`;
    })
    .join('\n');
}
