#!/usr/bin/env node
import type { z } from 'zod';
import { documentArgsSchema, runDocumentAction } from './actions/document.js';
import {
  glossaryCreateArgsSchema,
  glossaryIdArgsSchema,
  glossaryListArgsSchema,
  runGlossaryCreateAction,
  runGlossaryDeleteAction,
  runGlossaryEntriesAction,
  runGlossaryGetAction,
  runGlossaryListAction,
} from './actions/glossary.js';
import { languagesArgsSchema, runLanguagesAction } from './actions/languages.js';
import { runTextAction, textArgsSchema } from './actions/text.js';
import { runUsageAction, usageArgsSchema } from './actions/usage.js';
import { cliInputSchema, parseArgs } from './cli-args.js';

function printHelp(): void {
  console.log(`translator-cli

Usage:
  cli help
  cli usage
  cli usage --json --pretty
  cli languages
  cli languages --glossary
  cli text --to=DE --text="Hello, world"
  cli text --from=EN --to=FR --formality=more --text="How are you?"
  cli text --from=EN --to=DE --glossary=<glossary-id> --text="artist"
  cli document --to=DE --file="./docs/report.docx" --dest="./tmp/translated"
  cli document --to=DE --file="./docs/report.docx" --dest="./tmp/translated" --outputFormat=pdf
  cli glossary-create --name="My glossary" --from=EN --to=DE --file="./glossary.tsv"
  cli glossary-list --pretty
  cli glossary-get --id=<glossary-id>
  cli glossary-entries --id=<glossary-id>
  cli glossary-delete --id=<glossary-id>

Commands:
  help              Show this help message
  usage             Print account usage for this billing period
  languages         List source and target languages
  text              Translate text and print the result as JSON
  document          Translate a document file and save the result
  glossary-create   Create a glossary from a TSV (or .csv) file
  glossary-list     List glossaries
  glossary-get      Print glossary information by ID
  glossary-entries  Print glossary entries by ID
  glossary-delete   Delete a glossary by ID

Common options:
  --authKey    Optional. Defaults to TRANSLATOR_AUTH_KEY.
  --serverUrl  Optional. Defaults to TRANSLATOR_SERVER_URL, then the URL matching the auth key.
  --proxyUrl   Optional. Defaults to TRANSLATOR_PROXY_URL. Axios transport only.
  --transport  Optional. One of: axios, fetch (default: axios).
  --outputFile Optional. Writes output to the given file path.
  --pretty     Optional. Pretty-print JSON output.

Usage options:
  --json  Optional. Print usage as JSON.

Languages options:
  --glossary  Optional. List language pairs supported for glossaries.

Text options:
  --text                Required. Text to translate.
  --to                  Required. Target language code, e.g. DE or EN-US.
  --from                Optional. Source language code; detected when omitted.
  --formality           Optional. One of: less, more, default, prefer_less, prefer_more.
  --splitSentences      Optional. One of: 0, 1, nonewlines.
  --tagHandling         Optional. One of: xml, html.
  --context             Optional. Additional context that is not translated.
  --glossary            Optional. Glossary ID; requires --from.
  --preserveFormatting  Optional. Keep the original formatting.

Document options:
  --file          Required. Document to translate.
  --dest          Required. Output directory.
  --to            Required. Target language code.
  --from          Optional. Source language code.
  --formality     Optional. Same values as for text.
  --glossary      Optional. Glossary ID; requires --from.
  --outputFormat  Optional. File extension of the translated document.
  --timeoutMs     Optional. Give up waiting for the translation after this many milliseconds.

Glossary options:
  --name  Required for glossary-create.
  --from  Required for glossary-create. Source language code.
  --to    Required for glossary-create. Target language code.
  --file  Required for glossary-create. Entries file, tab-separated unless it ends in .csv.
  --id    Required for glossary-get, glossary-entries and glossary-delete.
`);
}

async function runWithArgs<Args>(
  schema: z.ZodType<Args, z.ZodTypeDef, unknown>,
  options: Record<string, string>,
  run: (args: Args) => Promise<number>,
): Promise<number> {
  const parsedArgs = schema.safeParse(options);
  if (!parsedArgs.success) {
    console.error(parsedArgs.error.issues[0]?.message ?? 'Invalid arguments');
    printHelp();
    return 1;
  }

  return run(parsedArgs.data);
}

async function main(): Promise<number> {
  const { command, options } = parseArgs(process.argv.slice(2));
  const parsedCliInput = cliInputSchema.safeParse({ command, options });

  if (!parsedCliInput.success) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  switch (parsedCliInput.data.command) {
    case 'help':
      printHelp();
      return 0;
    case 'usage':
      return runWithArgs(usageArgsSchema, options, runUsageAction);
    case 'languages':
      return runWithArgs(languagesArgsSchema, options, runLanguagesAction);
    case 'text':
      return runWithArgs(textArgsSchema, options, runTextAction);
    case 'document':
      return runWithArgs(documentArgsSchema, options, runDocumentAction);
    case 'glossary-create':
      return runWithArgs(glossaryCreateArgsSchema, options, runGlossaryCreateAction);
    case 'glossary-list':
      return runWithArgs(glossaryListArgsSchema, options, runGlossaryListAction);
    case 'glossary-get':
      return runWithArgs(glossaryIdArgsSchema, options, runGlossaryGetAction);
    case 'glossary-entries':
      return runWithArgs(glossaryIdArgsSchema, options, runGlossaryEntriesAction);
    case 'glossary-delete':
      return runWithArgs(glossaryIdArgsSchema, options, runGlossaryDeleteAction);
  }
}

const exitCode = await main();
process.exitCode = exitCode;
