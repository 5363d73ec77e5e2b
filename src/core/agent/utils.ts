/**
 * Agent utility functions
 */

import { last } from 'lodash-es';
import type { MessageParam } from '../providers/ILLMProvider';
import { findToolName, getToolResults } from '../../utils/messages';
import type { ToolAttribution } from './types';

/**
 * A call is tool-related when the conversation it sends ends with tool
 * results. It is attributed to the tool behind the first of those results.
 */
export function getToolAttribution(messages: MessageParam[]): ToolAttribution {
  const toolResults = getToolResults(last(messages));
  const [firstResult] = toolResults;
  if (!firstResult) {
    return { isToolRelated: false };
  }
  const toolName = findToolName(messages[messages.length - 2], firstResult.tool_use_id);
  return toolName ? { isToolRelated: true, toolName } : { isToolRelated: true };
}
