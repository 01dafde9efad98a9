import { Agent } from 'undici';

export interface AttemptAgentOptions {
  readonly connectTimeoutMs: number;
  /** SNI for TLS; the request is addressed to a bare IP. */
  readonly servername?: string;
}

/**
 * One-shot dispatcher for a single attempt: a single connection with
 * keep-alive disabled. Callers destroy it when the attempt ends.
 */
export function createAttemptAgent(options: AttemptAgentOptions): Agent {
  return new Agent({
    connect: {
      timeout: options.connectTimeoutMs,
      ...(options.servername ? { servername: options.servername } : {}),
    },
    connections: 1,
    pipelining: 0,
  });
}

export async function destroyAgent(agent: Agent): Promise<void> {
  if (agent.destroyed) return;
  await agent.destroy();
}
