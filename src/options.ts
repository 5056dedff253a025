import { UsageError } from './errors';
import type { ProcessOptions } from './config';

export interface CliArgs {
  inputs: string[];
  flags: Partial<ProcessOptions>;
  configPath?: string;
  help: boolean;
}

export const USAGE = `Usage: watermark-unblend [options] <image|directory|glob>...

Removes the semi-transparent corner logo from images by reversing
the alpha blend that applied it.

Options:
  -s, --suffix <text>    Suffix appended to output file names (default "_clean")
  -c, --config <file>    JSONC file with "suffix" and "jpegQuality" settings
      --quality <1-100>  JPEG output quality (default 95)
  -v, --verbose          Report detected watermark geometry for each image
  -q, --quiet            Suppress all output except errors
  -h, --help             Show this message

Examples:
  watermark-unblend image.png
  watermark-unblend -s _nowm image.png
  watermark-unblend ./images/
  watermark-unblend "photos/*.jpg"
`;

function parseQuality(value: string): number {
  const quality = Number(value);
  if (!Number.isInteger(quality) || quality < 1 || quality > 100) {
    throw new UsageError(`--quality must be an integer from 1 to 100, got "${value}"`);
  }
  return quality;
}

export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = { inputs: [], flags: {}, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    const takeValue = (): string => {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new UsageError(`Missing value for ${arg}`);
      }
      i++;
      return value;
    };

    switch (arg) {
      case '-s':
      case '--suffix': {
        const suffix = takeValue();
        if (suffix === '') {
          throw new UsageError('Suffix must not be empty');
        }
        result.flags.suffix = suffix;
        break;
      }
      case '-c':
      case '--config':
        result.configPath = takeValue();
        break;
      case '--quality':
        result.flags.jpegQuality = parseQuality(takeValue());
        break;
      case '-v':
      case '--verbose':
        result.flags.verbose = true;
        break;
      case '-q':
      case '--quiet':
        result.flags.quiet = true;
        break;
      case '-h':
      case '--help':
        result.help = true;
        break;
      case '--':
        result.inputs.push(...argv.slice(i + 1));
        i = argv.length;
        break;
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        result.inputs.push(arg);
    }
  }

  return result;
}
