import type { CommandModule } from 'yargs';
import { ConversionError, convertFile, loadProjectConfig, parseTabSize, DEFAULT_TAB_SIZE } from '@bin2const/core';
import { isVerbose, optionalString, projectDir } from '../args.ts';

export const USAGE = `\
Usage: bin2const <input_file> <output_const_name> <conversion_type> [tab_size] [output_file]
    <input_file>        The file to convert.
    <output_const_name> The name of the constant to generate. Has no effect if the conversion type
                        is bin or hex.
    <conversion_type>   The type of conversion to use: bin, hex, c, cdef, rust, csharp, python,
                        javascript, go, java, or one of their aliases (see "bin2const formats").
    [tab_size]          The size of a tabulation in the output. Defaults to 4.
    [output_file]       Optional output file. When omitted the output is printed to stdout.
Arguments after [output_file] are ignored. An input file named "formats" or "init" must be
given with a path prefix (./formats), since those names select subcommands.`;

export interface ConvertCommandOptions {
  input?: string;
  name?: string;
  format?: string;
  tabSize?: string;
  output?: string;
  project: string;
  verbose: boolean;
}

export function runConvert(options: ConvertCommandOptions): void {
  const { input, name, format } = options;
  if (input === undefined || name === undefined || format === undefined) {
    console.log(USAGE);
    return;
  }

  try {
    const config = loadProjectConfig(options.project);
    const tabSize = parseTabSize(options.tabSize, config.tabSize ?? DEFAULT_TAB_SIZE);
    const result = convertFile({
      input,
      name,
      format,
      tabSize,
      output: options.output,
      aliases: config.aliases,
    });

    if (options.verbose) {
      console.error(`Read ${result.bytesRead} bytes from ${input}`);
      console.error(`Format: ${result.kind}, tab size ${tabSize}`);
    }

    if (result.written === undefined) {
      console.log(result.text);
    } else if (options.verbose) {
      console.error(`Wrote ${result.text.length} characters to ${result.written}`);
    }
  } catch (err) {
    if (err instanceof ConversionError) {
      console.error(err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

export const convertCommand: CommandModule = {
  command: '$0 [input] [name] [format] [tabSize] [output]',
  describe: 'Convert a binary file into a dump or a source constant',
  builder: (yargs) =>
    yargs
      .positional('input', {
        describe: 'The file to convert',
        type: 'string',
      })
      .positional('name', {
        describe: 'Name of the generated constant',
        type: 'string',
      })
      .positional('format', {
        describe: 'Conversion type or alias',
        type: 'string',
      })
      .positional('tabSize', {
        describe: 'Indentation width in spaces (default: 4)',
        type: 'string',
      })
      .positional('output', {
        describe: 'Output file (omit to print to stdout)',
        type: 'string',
      }),
  handler: (argv) => {
    runConvert({
      input: optionalString(argv['input']),
      name: optionalString(argv['name']),
      format: optionalString(argv['format']),
      tabSize: optionalString(argv['tabSize']),
      output: optionalString(argv['output']),
      project: projectDir(argv),
      verbose: isVerbose(argv),
    });
  },
};
