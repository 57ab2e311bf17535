/**
 * CLI entry point using Commander.js.
 * One command per resolver.
 */
import { Command } from 'commander';

const VERSION = '0.1.0'; // Match package.json

/**
 * Create and configure the CLI program.
 * @returns Configured Commander program
 */
export function createCLI(): Command {
  const program = new Command();

  program
    .name('matrix-discovery')
    .description('Resolve Matrix server names and client well-known delegation')
    .version(VERSION);

  program
    .command('server')
    .description('Resolve a federation server name to a connect address and Host header')
    .argument('<name>', 'server name, e.g. example.org or example.org:8448')
    .option('-s, --socket', 'also resolve the connect address to an IP and port')
    .action(async (name: string, options: { socket?: boolean }) => {
      const { runServer } = await import('./commands/server.js');
      await runServer(name, { socket: options.socket === true });
    });

  program
    .command('client')
    .description('Resolve the client-server API base URL for an account domain')
    .argument('<domain>', 'account domain, e.g. example.org')
    .action(async (domain: string) => {
      const { runClient } = await import('./commands/client.js');
      await runClient(domain);
    });

  return program;
}

/**
 * Run the CLI program.
 * Uses parseAsync for proper async action handling.
 */
export async function runCLI(argv: string[] = process.argv): Promise<void> {
  const program = createCLI();
  await program.parseAsync(argv);
}
