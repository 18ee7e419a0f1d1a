import { z } from 'zod';
import { formatJson, writeOutput } from '../utils/json.js';
import { cliBoolean, connectionArgsSchema, withTranslator } from './shared.js';

const languagesArgsSchema = z.object({
  ...connectionArgsSchema.shape,
  glossary: cliBoolean(),
});

type LanguagesArgs = z.infer<typeof languagesArgsSchema>;

export async function runLanguagesAction(args: LanguagesArgs): Promise<number> {
  return withTranslator(args, async (translator) => {
    if (args.glossary) {
      const pairs = await translator.getGlossaryLanguages();
      await writeOutput(formatJson({ glossaryLanguagePairs: pairs }, args.pretty), args.outputFile);
      return 0;
    }

    const [source, target] = await Promise.all([translator.getSourceLanguages(), translator.getTargetLanguages()]);
    await writeOutput(formatJson({ source, target }, args.pretty), args.outputFile);
    return 0;
  });
}

export { languagesArgsSchema };
export type { LanguagesArgs };
