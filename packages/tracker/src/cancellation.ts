/**
 * Cooperative cancellation
 *
 * Long-running loops poll a token between units of work. Nothing is ever
 * interrupted mid-request: an in-flight call always runs to completion.
 */

import { CancelledError } from './errors.js'

export interface CancellationToken {
  /** Polled between requests; may read persisted state */
  isCancelled(): boolean | Promise<boolean>
}

/**
 * In-memory cancellation flag owned by the caller
 */
export class CancellationSource implements CancellationToken {
  private cancelled = false
  private cancelReason?: string

  cancel(reason?: string): void {
    this.cancelled = true
    this.cancelReason = reason
  }

  isCancelled(): boolean {
    return this.cancelled
  }

  get reason(): string | undefined {
    return this.cancelReason
  }
}

/** Token that never fires */
export const NEVER_CANCELLED: CancellationToken = {
  isCancelled: () => false,
}

/**
 * Token that fires when any of the given tokens fires
 */
export function anyCancelled(...tokens: Array<CancellationToken | undefined>): CancellationToken {
  const active = tokens.filter((t): t is CancellationToken => t !== undefined)
  return {
    async isCancelled() {
      for (const token of active) {
        if (await token.isCancelled()) return true
      }
      return false
    },
  }
}

/**
 * Throw a CancelledError if the token has fired
 */
export async function throwIfCancelled(
  token: CancellationToken | undefined,
  message?: string
): Promise<void> {
  if (token && (await token.isCancelled())) {
    throw new CancelledError(message)
  }
}
