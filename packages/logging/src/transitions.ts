/**
 * Shared logging helpers for state machine transitions.
 *
 * Builders and machines log through these so every embedding application
 * sees the same message text and data keys.
 */
import type { Logger } from "./types.js";

/**
 * Base context for transition logging.
 */
export type BaseTransitionLogContext = {
  entityLabel: string;
  from: string;
  to: string;
  [key: string]: unknown;
};

/**
 * Log a transition whose side effect ran and whose cursor moved.
 */
export function logTransitionApplied(
  logger: Logger,
  context: BaseTransitionLogContext,
  detail: { conditionName?: string | undefined; sideEffectName?: string | undefined } = {}
): void {
  logger.debug("Transition applied", {
    ...context,
    ...(detail.conditionName !== undefined && { conditionName: detail.conditionName }),
    ...(detail.sideEffectName !== undefined && { sideEffectName: detail.sideEffectName }),
  });
}

/**
 * Log an attempt that found no eligible transition.
 */
export function logTransitionRejected(
  logger: Logger,
  context: BaseTransitionLogContext,
  reason: { candidates: number }
): void {
  logger.debug("Transition rejected", {
    ...context,
    candidates: reason.candidates,
  });
}

/**
 * Log a side effect that threw. The cursor has not moved.
 */
export function logTransitionFailed(
  logger: Logger,
  context: BaseTransitionLogContext,
  error: unknown
): void {
  logger.error("Transition side effect failed", {
    ...context,
    error: error instanceof Error ? { message: error.message, stack: error.stack } : String(error),
  });
}

/**
 * Log a guard or side effect name that did not resolve against a registry
 * and was replaced by the always-eligible guard or the no-op side effect.
 */
export function logNameResolutionFallback(
  logger: Logger,
  context: BaseTransitionLogContext,
  fallback: { kind: "condition" | "sideEffect"; name: string }
): void {
  const message =
    fallback.kind === "condition"
      ? "Condition not found in registry, transition is always eligible"
      : "Side effect not found in registry, using no-op";
  logger.warn(message, {
    ...context,
    [fallback.kind === "condition" ? "conditionName" : "sideEffectName"]: fallback.name,
  });
}
