import type { KeyId } from "../../crypto";
import { createLogger } from "../../logger";
import type { Logger } from "../../logger";

/**
 * Per-signature outcomes reported while verifying a threshold.
 * None of them fails verification on its own.
 */
export type VerificationEvent =
  | { kind: 'good_signature'; keyId: KeyId }
  | { kind: 'unauthorized_key'; keyId: KeyId }
  | { kind: 'bad_signature'; keyId: KeyId; error: Error };

export type VerificationObserver = (event: VerificationEvent) => void;

/**
 * Forwards verification events to a logger: good signatures at debug,
 * everything else at warn.
 */
export function createLoggingObserver(logger: Logger): VerificationObserver {
  return (event) => {
    switch (event.kind) {
      case 'good_signature':
        logger.debug(`Good signature from key ID ${event.keyId}`);
        break;
      case 'bad_signature':
        logger.warn(`Bad signature from key ID ${event.keyId}: ${event.error.message}`);
        break;
      case 'unauthorized_key':
        logger.warn(`Key ID ${event.keyId} was not found in the set of authorized keys.`);
        break;
    }
  };
}

export const defaultVerificationObserver: VerificationObserver = createLoggingObserver(createLogger("[Verify] "));

/**
 * Collects events in memory, in the order they were reported.
 */
export function collectVerificationEvents(): { observer: VerificationObserver; events: VerificationEvent[] } {
  const events: VerificationEvent[] = [];
  return {
    observer: (event) => { events.push(event); },
    events,
  };
}
