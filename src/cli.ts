import { Builtins, Cli } from 'clipanion';
import { ConvertCommand } from './commands/convert';

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: 'Vimwiki Markdown → HTML',
    binaryName: 'vimwiki-markdown-html',
    binaryVersion: '1.0.0'
  });

  cli.register(ConvertCommand);
  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);
  return cli;
}
