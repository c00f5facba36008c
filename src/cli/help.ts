/**
 * CLI Help Text
 */

/** Get the usage text */
export function getUsageText(): string {
  return `Usage: mda-sequence <sequence.json> [options]

Expand a multi-dimensional acquisition sequence into its ordered events.

Options:
  --format <summary|table|json>  Output format (default: summary)
  --fov <width>x<height>         Field of view used by grid plans (default: 1x1)
  --axis-order <order>           Override the axis order stored in the file, e.g. tpgcz
  --limit <number>               Stop after this many events (table and json)
  --no-interactive               Never prompt; continue past sequence warnings
  --verbose                      Log progress details
  --debug                        Log full diagnostics
  --json-logs                    Write log events to stderr as JSON lines
  -h, --help                     Show this help message
  -v, --version                  Show version number

Config files (CLI flags take precedence):
  ./.mda-sequence.json
  ~/.config/mda-sequence/config.json

Examples:
  mda-sequence timelapse.json
  mda-sequence timelapse.json --format table --limit 20
  mda-sequence tiles.json --fov 512x512 --format json
  mda-sequence timelapse.json --axis-order tpcz`;
}

export function printUsage(stream: NodeJS.WritableStream = process.stderr): void {
  stream.write(`${getUsageText()}\n`);
}
