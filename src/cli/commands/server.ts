/**
 * Server command - resolve a federation server name.
 */
import { connectAddress, hostHeader } from '../../discovery/server.js';
import { createCommandResolvers, reportFailure } from './context.js';

export interface ServerCommandOptions {
  socket: boolean;
}

export async function runServer(name: string, options: ServerCommandOptions): Promise<void> {
  try {
    const { server: resolver } = createCommandResolvers();
    const server = await resolver.resolve(name);

    const output: Record<string, unknown> = {
      name,
      kind: server.kind,
      hostHeader: hostHeader(server),
      connectAddress: connectAddress(server),
    };
    if (options.socket) {
      output.socket = await resolver.addressOf(server);
    }

    console.log(JSON.stringify(output, null, 2));
  } catch (error) {
    reportFailure(error, name);
  }
}
