import { z } from 'zod';
import { describeUsage } from '../api-data.js';
import { formatJson, writeOutput } from '../utils/json.js';
import { cliBoolean, connectionArgsSchema, withTranslator } from './shared.js';

const usageArgsSchema = z.object({
  ...connectionArgsSchema.shape,
  json: cliBoolean(),
});

type UsageArgs = z.infer<typeof usageArgsSchema>;

export async function runUsageAction(args: UsageArgs): Promise<number> {
  return withTranslator(args, async (translator) => {
    const usage = await translator.getUsage();
    const output = args.json ? formatJson(usage, args.pretty) : describeUsage(usage);

    await writeOutput(output, args.outputFile);
    return 0;
  });
}

export { usageArgsSchema };
export type { UsageArgs };
