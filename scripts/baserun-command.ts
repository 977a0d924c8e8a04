import { Args, Command, Flags } from '@oclif/core';
import { runLaunchCli } from '../src/cli/launch-cli.ts';
import { BASERUN_CONFIG_FILE_NAME } from '../src/config/config-core.ts';

export class LaunchCommand extends Command {
  static override summary =
    'Classify a connection descriptor and open it with the configured starter.';

  static override description = [
    'Accepted descriptor forms: host;ref, Srvr="host";Ref="ref";, File="<path>"; and ws="<url>";.',
    'Without a descriptor an interactive prompt opens with the saved history',
    '(Up/Down select, Enter recalls or launches, Ctrl+D toggles designer mode, Esc quits).',
  ].join('\n');

  static override usage = ['[DESCRIPTOR] [--designer] [--starter <path>] [--config <path>]'];

  static override args = {
    descriptor: Args.string({
      description: 'Connection descriptor to launch; omit to open the interactive prompt.',
      required: false,
    }),
  };

  static override flags = {
    help: Flags.help({ char: 'h' }),
    designer: Flags.boolean({
      char: 'd',
      description: 'Launch in designer mode.',
      default: false,
    }),
    starter: Flags.string({
      description: 'Starter executable path; overrides starter.path from the config file.',
    }),
    config: Flags.string({
      description: `Config file path (default ./${BASERUN_CONFIG_FILE_NAME}).`,
    }),
  };

  override async run(): Promise<void> {
    const { args, flags } = await this.parse(LaunchCommand);
    const code = await runLaunchCli({
      descriptor: args.descriptor ?? null,
      designer: flags.designer,
      starterPath: flags.starter ?? null,
      configPath: flags.config ?? null,
    });
    if (code !== 0) {
      this.exit(code);
    }
  }
}
