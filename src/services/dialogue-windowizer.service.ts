import type {
  ConversationWindow,
  DialogueMessage,
  Exchange,
  LineJoinPolicy,
  TurnGroup,
} from '../types/dialogue.types';
import { ValidationError } from '../utils/errors';

export const DEFAULT_WINDOW_SIZE = 5;

const SEPARATORS: Record<LineJoinPolicy, string> = {
  newlineJoin: '\n',
  spaceJoin: ' ',
};

export function toDialogueMessages(groups: readonly TurnGroup[], lineJoin: LineJoinPolicy): DialogueMessage[] {
  const separator = SEPARATORS[lineJoin];
  return groups.map((group): DialogueMessage => ({
    from: group.role === 'client' ? 'human' : 'gpt',
    value: group.lines.join(separator),
  }));
}

/**
 * Scans for human messages immediately followed by gpt. Any other adjacency
 * consumes a single position and yields nothing.
 */
export function findExchanges(messages: readonly DialogueMessage[]): Exchange[] {
  const exchanges: Exchange[] = [];
  let i = 0;
  while (i < messages.length - 1) {
    if (messages[i].from === 'human' && messages[i + 1].from === 'gpt') {
      exchanges.push({ humanIndex: i, gptIndex: i + 1 });
      i += 2;
    } else {
      i += 1;
    }
  }
  return exchanges;
}

export function assertWindowSize(windowSize: number): void {
  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new ValidationError(`windowSize must be a positive integer, got ${windowSize}`);
  }
}

/**
 * One window per exchange, holding that exchange and up to windowSize - 1
 * exchanges before it.
 */
export function buildWindows(
  messages: readonly DialogueMessage[],
  windowSize: number = DEFAULT_WINDOW_SIZE
): ConversationWindow[] {
  assertWindowSize(windowSize);
  if (messages.length < 2) return [];

  const exchanges = findExchanges(messages);
  return exchanges.map((_, k) => {
    const window: DialogueMessage[] = [];
    for (let j = Math.max(0, k - windowSize + 1); j <= k; j++) {
      window.push(messages[exchanges[j].humanIndex], messages[exchanges[j].gptIndex]);
    }
    return { messages: window };
  });
}
