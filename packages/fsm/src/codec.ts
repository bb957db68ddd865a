/**
 * JSON encoding of {@link DefinitionDto}s.
 *
 * `decodeDefinition(encodeDefinition(dto))` equals `dto` field for field.
 * Decoding validates the shape, so a hand-edited file fails here with
 * `INVALID_DTO` rather than later inside `loadFrom()`.
 */

import { parseDefinitionDto, type DefinitionDto } from "./dto.js";
import { FSMError, FSM_ERROR_CODES } from "./errors.js";

export interface EncodeOptions {
  /** Spaces of indentation; omit for compact output */
  indent?: number;
}

/**
 * Encode a definition DTO as JSON text. Absent names are left out.
 */
export function encodeDefinition(dto: DefinitionDto, options: EncodeOptions = {}): string {
  const validated = parseDefinitionDto(dto);
  return JSON.stringify(validated, null, options.indent);
}

/**
 * Decode JSON text into a validated definition DTO.
 *
 * @throws FSMError INVALID_DTO for malformed JSON or a shape mismatch
 */
export function decodeDefinition(text: string): DefinitionDto {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new FSMError(
      FSM_ERROR_CODES.INVALID_DTO,
      `Invalid state machine definition: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error instanceof Error ? error.message : String(error) }
    );
  }
  return parseDefinitionDto(raw);
}
