import type { Message } from './Message.js';

export interface FilterStatistics {
  originalCount: number;
  keptCount: number;
  removedProgress: number;
  removedFileHistory: number;
  truncatedMessages: number;
  strippedToolContent: number;
}

/**
 * Filter 輸出
 * 不變式：stats.keptCount === messages.length；originalCount >= keptCount
 */
export interface FilteredTranscript {
  sessionId: string;
  messages: Message[];
  stats: FilterStatistics;
}
