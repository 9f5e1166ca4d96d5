import { v5 as uuidv5 } from 'uuid';

// Fixed namespace so a conversation maps to the same session across restarts
const SESSION_NAMESPACE = '6f1d3c2a-9b8e-4f7a-a5d4-3e2b1c0f9a87';

/**
 * Stable session id for a conversation: one per thread, or one per channel
 * for top-level messages
 */
export function sessionIdFor(channel: string, threadTs?: string): string {
  return uuidv5(`${channel}_${threadTs || channel}`, SESSION_NAMESPACE);
}
