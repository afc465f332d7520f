import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { parsePanelOutput } from '@edgebar/shared';
import { loadContainerConfig, loadEnvConfig } from '@edgebar/panel-server';

import { loadAppletList, runLayoutSimulation } from './commands/layout';
import { runPriority } from './commands/priority';
import { runValidate } from './commands/validate';
import { parseOutputArg } from './outputArg';

function printResult(result: unknown, json: boolean): void {
  if (json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log(result);
  }
}

async function main(): Promise<void> {
  const env = loadEnvConfig();

  const parser = yargs(hideBin(process.argv))
    .scriptName('edgebar')
    .usage('Usage: $0 <command> [options]')
    .option('json', {
      type: 'boolean',
      default: true,
      describe: 'Output JSON',
    })
    .option('config', {
      type: 'string',
      default: env.configPath,
      describe: 'Panel configuration file (JSON or YAML).',
    })
    .command(
      'validate',
      'Check a panel configuration file.',
      {},
      (argv) => {
        printResult(runValidate(argv.config), argv.json);
      },
    )
    .command(
      'priority',
      'List panels in recreation order.',
      {
        output: {
          type: 'string',
          describe: 'Only panels targeting this output.',
        },
        target: {
          type: 'string',
          describe: 'Only panels configured with this target: All, Active or Name(<output>).',
        },
      },
      (argv) => {
        const target = argv.target === undefined ? undefined : parsePanelOutput(argv.target);
        printResult(
          runPriority(loadContainerConfig(argv.config), argv.output, target),
          argv.json,
        );
      },
    )
    .command(
      'layout',
      'Simulate one panel on one output and print where its applets land.',
      {
        panel: {
          type: 'string',
          describe: 'Panel name.',
          demandOption: true,
        },
        output: {
          type: 'string',
          describe: 'Output as NAME:WIDTHxHEIGHT[@SCALE].',
          demandOption: true,
        },
        applets: {
          type: 'string',
          describe: 'JSON file listing applets: [{ "plugin", "width", "height" }].',
        },
        frames: {
          type: 'number',
          default: 32,
          describe: 'Maximum frames to simulate.',
        },
      },
      (argv) => {
        const result = runLayoutSimulation({
          container: loadContainerConfig(argv.config),
          panelName: argv.panel,
          output: parseOutputArg(argv.output),
          applets: argv.applets ? loadAppletList(argv.applets) : [],
          maxFrames: argv.frames,
        });
        printResult(result, argv.json);
        if (!result.settled) {
          process.exitCode = 1;
        }
      },
    )
    .demandCommand(1, 'You must specify a command')
    .strict()
    .help();

  await parser.parseAsync();
}

main().catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
