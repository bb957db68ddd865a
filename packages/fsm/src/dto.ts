/**
 * Serializable definition DTOs.
 *
 * The persisted form of a definition: names only, no functions. Any encoding
 * with string scalars, ordered lists and optional fields can carry it. Guard
 * and side effect names are turned back into functions by a
 * `TransitionRegistry` when the DTO is loaded into a builder.
 *
 * @module dto
 */

import { z } from "zod";
import { FSMError, FSM_ERROR_CODES } from "./errors.js";

// ============================================================================
// Zod Schemas
// ============================================================================

/**
 * Schema for one serialized transition.
 */
export const TransitionDtoSchema = z.object({
  /** Source state name */
  from: z.string().min(1),
  /** Target state name */
  to: z.string().min(1),
  /** Registered guard name; absent when the transition is unguarded or unnamed */
  conditionName: z.string().optional(),
  /** Registered side effect name; absent when there is none or it is unnamed */
  sideEffectName: z.string().optional(),
});

/**
 * Schema for a serialized definition.
 */
export const DefinitionDtoSchema = z.object({
  /** Entity label, e.g. "Ticket" */
  entityLabel: z.string(),
  /** Name of the initial state */
  initialState: z.string().min(1),
  /** Every state name, in insertion order */
  states: z.array(z.string().min(1)),
  /** Every transition, in declaration order */
  transitions: z.array(TransitionDtoSchema),
});

/**
 * Type inferred from TransitionDtoSchema.
 */
export type TransitionDto = z.infer<typeof TransitionDtoSchema>;

/**
 * Type inferred from DefinitionDtoSchema.
 */
export type DefinitionDto = z.infer<typeof DefinitionDtoSchema>;

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate unknown data against {@link DefinitionDtoSchema}.
 *
 * @throws FSMError INVALID_DTO listing every schema issue
 */
export function parseDefinitionDto(input: unknown): DefinitionDto {
  const result = DefinitionDtoSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
    code: issue.code,
  }));
  const summary = issues.map((issue) => `${issue.path || "(root)"}: ${issue.message}`).join("; ");
  throw new FSMError(FSM_ERROR_CODES.INVALID_DTO, `Invalid state machine definition: ${summary}`, {
    issues,
  });
}

/**
 * Build a transition DTO, leaving absent names out instead of writing `undefined`.
 */
export function toTransitionDto(
  from: string,
  to: string,
  conditionName: string | undefined,
  sideEffectName: string | undefined
): TransitionDto {
  return {
    from,
    to,
    ...(conditionName !== undefined && { conditionName }),
    ...(sideEffectName !== undefined && { sideEffectName }),
  };
}
