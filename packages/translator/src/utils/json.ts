import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

export function formatJson(value: unknown, pretty: boolean): string {
  return pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
}

/** Writes CLI output to `outputFile`, creating its directory, or prints it to stdout. */
export async function writeOutput(output: string, outputFile?: string): Promise<void> {
  if (!outputFile) {
    console.log(output);
    return;
  }

  await mkdir(dirname(outputFile), { recursive: true });
  await writeFile(outputFile, output, 'utf-8');
}
