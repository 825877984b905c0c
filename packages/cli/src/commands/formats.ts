import type { CommandModule } from 'yargs';
import { listFormats } from '@bin2const/core';

export function formatTable(): string {
  const formats = listFormats();
  const width = Math.max(...formats.map((f) => f.kind.length));
  return formats
    .map((f) => `${f.kind.padEnd(width)}  ${f.description}\n${' '.repeat(width)}  aliases: ${f.aliases.join(', ')}`)
    .join('\n');
}

export const formatsCommand: CommandModule = {
  command: 'formats',
  describe: 'List output kinds and the selectors that choose them',
  handler: () => {
    console.log(formatTable());
  },
};
