import { Command, Help } from 'commander';
import pc from 'picocolors';
import { registerNewCommand } from './commands/new.js';
import { registerValidateCommand } from './commands/validate.js';
import { registerConvertCommand } from './commands/convert.js';
import { registerInspectCommand } from './commands/inspect.js';

const VERSION = '0.0.1';
const DESCRIPTION = 'Validate function configs and convert them to runtime descriptors';

// ── Program setup ───────────────────────────────────────────────────

export function createProgram(): Command {
  const program = new Command();

  program
    .name('fnconfig')
    .description(DESCRIPTION)
    .version(VERSION);

  // Styled help output
  program.configureHelp({
    helpWidth: 80,
    showGlobalOptions: false,
    styleTitle: (str: string) => pc.bold(pc.cyan(str)),
    styleUsage: (str: string) => pc.yellow(str),
    styleCommandText: (str: string) => pc.green(str),
    styleCommandDescription: (str: string) => pc.dim(str),
    styleSubcommandTerm: (str: string) => pc.green(str),
    styleSubcommandDescription: (str: string) => pc.dim(str),
    styleOptionTerm: (str: string) => pc.yellow(str),
    styleOptionDescription: (str: string) => pc.dim(str),
    styleArgumentTerm: (str: string) => pc.yellow(str),
    styleArgumentDescription: (str: string) => pc.dim(str),
    styleDescriptionText: (str: string) => pc.white(str),
    formatHelp(cmd: Command, helper: Help): string {
      const output: string = Help.prototype.formatHelp.call(helper, cmd, helper);

      if (cmd.name() === 'fnconfig' && !cmd.parent) {
        const header = [
          '',
          `  ${pc.bold(pc.cyan('fnconfig'))} ${pc.dim(`v${VERSION}`)}`,
          `  ${pc.dim(DESCRIPTION)}`,
          '',
        ].join('\n');

        const lines = output.split('\n');
        const withoutDesc = lines.filter(
          (l: string) => !l.includes(DESCRIPTION),
        );
        return header + '\n' + withoutDesc.join('\n');
      }

      return output;
    },
  });

  // Register commands
  registerNewCommand(program);
  registerValidateCommand(program);
  registerConvertCommand(program);
  registerInspectCommand(program);

  return program;
}
