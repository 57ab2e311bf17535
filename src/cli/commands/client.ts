/**
 * Client command - resolve the homeserver base URL for an account domain.
 */
import { classifyClientFailure } from '../../errors.js';
import { createCommandResolvers, reportFailure } from './context.js';

export async function runClient(domain: string): Promise<void> {
  try {
    const { client: resolver } = createCommandResolvers();
    const baseUrl = await resolver.resolve(domain);
    console.log(baseUrl.href);
  } catch (error) {
    const kind = classifyClientFailure(error);
    if (kind === 'prompt') {
      console.error('Discovery could not reach the domain. Retry, or enter the homeserver URL manually.');
    } else if (kind === 'fail') {
      console.error('The domain advertises a broken homeserver configuration.');
    }
    reportFailure(error, domain);
  }
}
