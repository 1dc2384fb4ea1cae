/**
 * demo: a root command with a global option and one subcommand
 *
 * Try:
 *   demo sub "hello world" '{"name":"Jane","id":456}' '{"name":"Joan","id":789}' --worker '{"name":"John","id":123}' -i 32
 *   demo sub "hello world" '{"name":"Jane","id":456}' -w='{"name":"John","id":123}'
 *   demo
 *   demo sub -h
 */

import { realpathSync } from 'node:fs';
import { z } from 'zod';
import { Arity } from '../src/schema/arity.js';
import { types } from '../src/schema/value-types.js';
import { Argument } from '../src/model/argument.js';
import { Command } from '../src/model/command.js';
import { Flag } from '../src/model/flag.js';
import { Option } from '../src/model/option.js';
import { runAndExit } from '../src/cli/run.js';

export const WorkerSchema = z.object({
  name: z.string(),
  id: z.number().int().nonnegative(),
});

export type Worker = z.infer<typeof WorkerSchema>;

export function createDemoCommand(write: (line: string) => void = (line) => console.log(line)): Command {
  const int = new Option({
    long: 'int',
    short: 'i',
    description: 'An integer option',
    type: types.int(),
    defaults: [42],
  });
  const worker = new Option({
    long: 'worker',
    short: 'w',
    description: 'A worker struct option (JSON)',
    type: types.json(WorkerSchema),
  });
  const verbose = new Flag({ long: 'verbose', short: 'v', description: 'Enable verbose output' });

  const input = new Argument({
    name: 'input',
    description: 'A string argument',
    type: types.string(),
    required: true,
  });
  const workerArg = new Argument({
    name: 'worker_arg',
    description: 'A worker struct argument',
    type: types.json(WorkerSchema),
    arity: new Arity(1, 2),
  });

  const sub = new Command({ name: 'sub', description: 'A subcommand' })
    .addOption(worker)
    .addArgument(input)
    .addArgument(workerArg)
    .withAction((ctx) => {
      write('Sub command action called!');
      write(`Global integer option: ${ctx.value(int)}`);

      if (ctx.hasOption(worker.key)) {
        const w = ctx.value(worker);
        write(`Worker from option: name=${w.name}, id=${w.id}`);
      } else {
        write('No worker option provided.');
      }

      write(`Input argument: ${ctx.value(input)}`);

      ctx.values(workerArg).forEach((w, i) => {
        write(`Worker_arg[${i}]: name=${w.name}, id=${w.id}`);
      });

      if (ctx.flag(verbose)) {
        write(`Resolved: ${JSON.stringify(ctx.snapshot())}`);
      }
      write('Action completed successfully!');
    });

  return new Command({ name: 'demo', description: 'A demo command' })
    .addOption(int)
    .addFlag(verbose)
    .addSubcommand(sub);
}

// Run only when executed directly, not when imported
const entry = process.argv[1];
if (entry && import.meta.url === `file://${realpathSync(entry)}`) {
  await runAndExit(createDemoCommand(), process.argv.slice(2));
}
