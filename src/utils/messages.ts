import { nanoid } from 'nanoid';
import type {
  ContentBlockParam,
  MessageParam,
  ResponseContentBlock,
  ResponseTextBlock,
  ResponseToolUseBlock,
  ToolResultBlockParam,
  ToolUseRequest,
} from '../core/providers/ILLMProvider';
import { NO_CONTENT_MESSAGE } from '../core/constants/providerErrors';

export function generateMessageId(): string {
  return `msg_${nanoid(24)}`;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isTextBlock(block: ResponseContentBlock): block is ResponseTextBlock {
  return block.type === 'text' && 'text' in block && typeof block.text === 'string';
}

export function isToolUseBlock(block: ResponseContentBlock): block is ResponseToolUseBlock {
  return (
    block.type === 'tool_use' &&
    'id' in block &&
    typeof block.id === 'string' &&
    'name' in block &&
    typeof block.name === 'string'
  );
}

export function extractTextContent(content: ReadonlyArray<ResponseContentBlock>): string {
  return content
    .filter(isTextBlock)
    .map(block => block.text)
    .join('');
}

export function extractToolUses(content: ReadonlyArray<ResponseContentBlock>): ToolUseRequest[] {
  return content.filter(isToolUseBlock).map(block => ({
    id: block.id,
    name: block.name,
    input: isRecord(block.input) ? block.input : {},
  }));
}

/**
 * Rebuild the response content as request params for the history
 * Empty text blocks are dropped; the API rejects them on the way back.
 */
export function normalizeContentFromAPI(
  content: ReadonlyArray<ResponseContentBlock>,
): ContentBlockParam[] {
  const blocks: ContentBlockParam[] = [];
  for (const block of content) {
    if (isTextBlock(block)) {
      if (block.text !== '') {
        blocks.push({ type: 'text', text: block.text });
      }
    } else if (isToolUseBlock(block)) {
      blocks.push({
        type: 'tool_use',
        id: block.id,
        name: block.name,
        input: isRecord(block.input) ? block.input : {},
      });
    }
  }
  if (blocks.length === 0) {
    blocks.push({ type: 'text', text: NO_CONTENT_MESSAGE });
  }
  return blocks;
}

/**
 * Turn whatever a tool callback returned into tool_result text
 */
export function stringifyToolResult(result: unknown): string {
  if (typeof result === 'string') {
    return result;
  }
  if (result === undefined) {
    return '';
  }
  if (typeof result === 'object' && result !== null) {
    return JSON.stringify(result);
  }
  return String(result);
}

export function createToolResultBlock(
  toolUseId: string,
  content: string,
  isError = false,
): ToolResultBlockParam {
  return {
    type: 'tool_result',
    tool_use_id: toolUseId,
    content,
    ...(isError ? { is_error: true } : {}),
  };
}

export function createUserMessage(content: string | ContentBlockParam[]): MessageParam {
  return { role: 'user', content };
}

export function createAssistantMessage(content: string | ContentBlockParam[]): MessageParam {
  return { role: 'assistant', content: content === '' ? NO_CONTENT_MESSAGE : content };
}

/**
 * Tool results carried by a message, in order
 */
export function getToolResults(message: MessageParam | undefined): ToolResultBlockParam[] {
  if (!message || typeof message.content === 'string') {
    return [];
  }
  return message.content.filter(
    (block): block is ToolResultBlockParam => block.type === 'tool_result',
  );
}

/**
 * Name of the tool that produced `toolUseId`, looked up in an assistant turn
 */
export function findToolName(message: MessageParam | undefined, toolUseId: string): string | undefined {
  if (!message || message.role !== 'assistant' || typeof message.content === 'string') {
    return undefined;
  }
  for (const block of message.content) {
    if (block.type === 'tool_use' && block.id === toolUseId) {
      return block.name;
    }
  }
  return undefined;
}
