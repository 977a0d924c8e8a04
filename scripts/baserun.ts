import { Errors, flush } from '@oclif/core';
import { LaunchCommand } from './baserun-command.ts';

try {
  await LaunchCommand.run(process.argv.slice(2), import.meta.url);
  await flush();
} catch (error: unknown) {
  await Errors.handle(error instanceof Error ? error : new Error(String(error)));
}
