/**
 * Message constants shared by the provider and the tool loop
 */

// Prefix for errors raised from Messages API failures
export const API_ERROR_MESSAGE_PREFIX = 'API Error';

// Stored in place of an empty assistant turn
export const NO_CONTENT_MESSAGE = '(no content)';

export const NO_SUCH_TOOL_MESSAGE_PREFIX = 'Error: No such tool available';
export const INPUT_VALIDATION_ERROR_PREFIX = 'InputValidationError';

export function noSuchToolMessage(toolName: string): string {
  return `${NO_SUCH_TOOL_MESSAGE_PREFIX}: ${toolName}`;
}
