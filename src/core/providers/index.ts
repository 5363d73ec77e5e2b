export * from './ILLMProvider';
export * from './AnthropicProvider';
