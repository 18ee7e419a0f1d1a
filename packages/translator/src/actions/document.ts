import { mkdir } from 'node:fs/promises';
import { basename, join, parse } from 'node:path';
import { z } from 'zod';
import { formalityValues } from '../api-data.js';
import { formatJson, writeOutput } from '../utils/json.js';
import {
  connectionArgsSchema,
  optionalCliInt,
  optionalCliString,
  requiredCliString,
  withTranslator,
} from './shared.js';

const documentArgsSchema = z.object({
  ...connectionArgsSchema.shape,
  file: requiredCliString('Missing required option: --file'),
  dest: requiredCliString('Missing required option: --dest'),
  to: requiredCliString('Missing required option: --to'),
  from: optionalCliString('Invalid --from'),
  formality: z
    .enum(formalityValues, { errorMap: () => ({ message: `Invalid --formality. One of: ${formalityValues.join(', ')}` }) })
    .optional(),
  glossary: optionalCliString('Invalid --glossary'),
  outputFormat: optionalCliString('Invalid --outputFormat').pipe(
    z.string().regex(/^[a-z0-9]+$/i, 'Invalid --outputFormat. Use a file extension such as docx or pdf.').optional(),
  ),
  timeoutMs: optionalCliInt('Invalid --timeoutMs. Must be a positive integer.'),
});

type DocumentArgs = z.infer<typeof documentArgsSchema>;

export function resolveOutputPath(file: string, dest: string, outputFormat?: string): string {
  const name = outputFormat ? `${parse(file).name}.${outputFormat.toLowerCase()}` : basename(file);
  return join(dest, name);
}

export async function runDocumentAction(args: DocumentArgs): Promise<number> {
  return withTranslator(args, async (translator) => {
    const outputPath = resolveOutputPath(args.file, args.dest, args.outputFormat);
    await mkdir(args.dest, { recursive: true });

    const status = await translator.translateDocumentFromFilepath(args.file, outputPath, {
      targetLang: args.to,
      sourceLang: args.from,
      formality: args.formality,
      glossary: args.glossary,
      outputFormat: args.outputFormat,
      timeoutMs: args.timeoutMs,
    });

    await writeOutput(formatJson({ document: outputPath, status }, args.pretty), args.outputFile);
    return 0;
  });
}

export { documentArgsSchema };
export type { DocumentArgs };
