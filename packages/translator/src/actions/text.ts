import { z } from 'zod';
import { formalityValues, splitSentencesValues } from '../api-data.js';
import { formatJson, writeOutput } from '../utils/json.js';
import { cliBoolean, connectionArgsSchema, optionalCliString, requiredCliString, withTranslator } from './shared.js';

const textArgsSchema = z.object({
  ...connectionArgsSchema.shape,
  text: requiredCliString('Missing required option: --text'),
  to: requiredCliString('Missing required option: --to'),
  from: optionalCliString('Invalid --from'),
  formality: z
    .enum(formalityValues, { errorMap: () => ({ message: `Invalid --formality. One of: ${formalityValues.join(', ')}` }) })
    .optional(),
  splitSentences: z
    .enum(splitSentencesValues, {
      errorMap: () => ({ message: `Invalid --splitSentences. One of: ${splitSentencesValues.join(', ')}` }),
    })
    .optional(),
  tagHandling: z.enum(['xml', 'html'], { errorMap: () => ({ message: 'Invalid --tagHandling. One of: xml, html' }) }).optional(),
  context: optionalCliString('Invalid --context'),
  glossary: optionalCliString('Invalid --glossary'),
  preserveFormatting: cliBoolean(),
});

type TextArgs = z.infer<typeof textArgsSchema>;

export async function runTextAction(args: TextArgs): Promise<number> {
  return withTranslator(args, async (translator) => {
    const result = await translator.translateText(args.text, {
      targetLang: args.to,
      sourceLang: args.from,
      formality: args.formality,
      splitSentences: args.splitSentences,
      tagHandling: args.tagHandling,
      context: args.context,
      glossary: args.glossary,
      preserveFormatting: args.preserveFormatting || undefined,
    });

    await writeOutput(formatJson(result, args.pretty), args.outputFile);
    return 0;
  });
}

export { textArgsSchema };
export type { TextArgs };
