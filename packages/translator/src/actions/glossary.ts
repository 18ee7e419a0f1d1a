import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { log } from '@workspace/logger';
import { z } from 'zod';
import { describeGlossary } from '../api-data.js';
import { convertTsvToDict } from '../glossary/entries.js';
import { formatJson, writeOutput } from '../utils/json.js';
import { connectionArgsSchema, requiredCliString, withTranslator } from './shared.js';

const glossaryCreateArgsSchema = z.object({
  ...connectionArgsSchema.shape,
  name: requiredCliString('Missing required option: --name'),
  from: requiredCliString('Missing required option: --from'),
  to: requiredCliString('Missing required option: --to'),
  file: requiredCliString('Missing required option: --file'),
});

const glossaryIdArgsSchema = z.object({
  ...connectionArgsSchema.shape,
  id: requiredCliString('Missing required option: --id'),
});

const glossaryListArgsSchema = connectionArgsSchema;

type GlossaryCreateArgs = z.infer<typeof glossaryCreateArgsSchema>;
type GlossaryIdArgs = z.infer<typeof glossaryIdArgsSchema>;
type GlossaryListArgs = z.infer<typeof glossaryListArgsSchema>;

/** Creates a glossary from a TSV file, or a CSV file when the extension is `.csv`. */
export async function runGlossaryCreateAction(args: GlossaryCreateArgs): Promise<number> {
  const content = await readFile(args.file, 'utf-8');

  return withTranslator(args, async (translator) => {
    const glossary =
      extname(args.file).toLowerCase() === '.csv'
        ? await translator.createGlossaryFromCsv(args.name, args.from, args.to, content)
        : await translator.createGlossary(args.name, args.from, args.to, convertTsvToDict(content));
    log.info(`Created ${describeGlossary(glossary)}`, { entryCount: glossary.entryCount });

    await writeOutput(formatJson(glossary, args.pretty), args.outputFile);
    return 0;
  });
}

export async function runGlossaryListAction(args: GlossaryListArgs): Promise<number> {
  return withTranslator(args, async (translator) => {
    const glossaries = await translator.listGlossaries();
    await writeOutput(formatJson({ glossaries }, args.pretty), args.outputFile);
    return 0;
  });
}

export async function runGlossaryGetAction(args: GlossaryIdArgs): Promise<number> {
  return withTranslator(args, async (translator) => {
    const glossary = await translator.getGlossary(args.id);
    await writeOutput(formatJson(glossary, args.pretty), args.outputFile);
    return 0;
  });
}

export async function runGlossaryEntriesAction(args: GlossaryIdArgs): Promise<number> {
  return withTranslator(args, async (translator) => {
    const entries = await translator.getGlossaryEntries(args.id);
    await writeOutput(formatJson(entries, args.pretty), args.outputFile);
    return 0;
  });
}

export async function runGlossaryDeleteAction(args: GlossaryIdArgs): Promise<number> {
  return withTranslator(args, async (translator) => {
    await translator.deleteGlossary(args.id);
    await writeOutput(formatJson({ deleted: args.id }, args.pretty), args.outputFile);
    return 0;
  });
}

export { glossaryCreateArgsSchema, glossaryIdArgsSchema, glossaryListArgsSchema };
export type { GlossaryCreateArgs, GlossaryIdArgs, GlossaryListArgs };
