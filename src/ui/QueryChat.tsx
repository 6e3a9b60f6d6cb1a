/**
 * Ink-based interactive query UI with fixed viewport and scrolling
 */
import React, { useState, useEffect, useMemo } from 'react';
import { Box, Text, useApp, useInput, useStdout } from 'ink';
import TextInput from 'ink-text-input';
import type { ResponseMode } from '../config.js';
import type { CollectionInfo } from '../rag/collectionStore.js';

interface Message {
  role: 'user' | 'answer' | 'system';
  content: string;
  timestamp?: Date;
}

export interface QueryChatProps {
  collectionName: string;
  documentCount: number;
  responseModes: readonly ResponseMode[];
  initialMode: ResponseMode;
  ask: (question: string, responseMode: ResponseMode) => Promise<string>;
  listCollections: () => CollectionInfo[];
}

const HELP_TEXT = '/help /mode <name> /collections /quit · ↑↓ to scroll';

export const QueryChat: React.FC<QueryChatProps> = ({
  collectionName,
  documentCount,
  responseModes,
  initialMode,
  ask,
  listCollections,
}) => {
  const [input, setInput] = useState('');
  const [messages, setMessages] = useState<Message[]>([
    {
      role: 'system',
      content: `Querying '${collectionName}'. Ask a question or type /help for commands.`,
    },
  ]);
  const [isProcessing, setIsProcessing] = useState(false);
  const [responseMode, setResponseMode] = useState<ResponseMode>(initialMode);
  const [scrollOffset, setScrollOffset] = useState(0);
  const { exit } = useApp();
  const { stdout } = useStdout();

  const terminalHeight = stdout?.rows ?? 24;
  const terminalWidth = stdout?.columns ?? 80;

  // Reserve space for header (3), input (3), footer (2), padding (2)
  const messageAreaHeight = Math.max(terminalHeight - 10, 5);

  // Auto-scroll to bottom when new messages arrive
  useEffect(() => {
    setScrollOffset(0);
  }, [messages.length]);

  const addMessage = (message: Message) => setMessages((prev) => [...prev, message]);

  // Convert all messages to rendered lines for line-by-line scrolling
  const allRenderedLines = useMemo(() => {
    const lines: Array<{ messageIdx: number; line: string; role: Message['role'] }> = [];
    const prefixes: Record<Message['role'], string> = { user: 'Q: ', answer: 'A: ', system: '' };

    messages.forEach((msg, idx) => {
      const prefix = prefixes[msg.role];
      const effectiveWidth = Math.max(terminalWidth - prefix.length - 2, 20);
      let isFirstLine = true;

      for (const line of msg.content.split('\n')) {
        if (line.length === 0) {
          lines.push({ messageIdx: idx, line: '', role: msg.role });
          isFirstLine = false;
          continue;
        }
        // Wrap long lines
        for (let i = 0; i < line.length; i += effectiveWidth) {
          const chunk = line.slice(i, i + effectiveWidth);
          const displayLine = isFirstLine ? `${prefix}${chunk}` : `${' '.repeat(prefix.length)}${chunk}`;
          lines.push({ messageIdx: idx, line: displayLine, role: msg.role });
          isFirstLine = false;
        }
      }

      lines.push({ messageIdx: idx, line: '', role: msg.role });
    });

    return lines;
  }, [messages, terminalWidth]);

  const totalLines = allRenderedLines.length;
  const maxScrollOffset = Math.max(0, totalLines - messageAreaHeight);
  const clampedScrollOffset = Math.min(scrollOffset, maxScrollOffset);

  // Scroll from bottom
  const startIdx = Math.max(0, totalLines - messageAreaHeight - clampedScrollOffset);
  const endIdx = totalLines - clampedScrollOffset;
  const visibleLines = allRenderedLines.slice(startIdx, endIdx);

  const canScrollUp = clampedScrollOffset < maxScrollOffset;
  const canScrollDown = clampedScrollOffset > 0;

  const handleCommand = (command: string, arg: string | undefined): void => {
    switch (command) {
      case '/quit':
      case '/exit':
        addMessage({ role: 'system', content: 'Goodbye!' });
        setTimeout(() => exit(), 500);
        return;
      case '/help':
        addMessage({ role: 'system', content: `${HELP_TEXT}\nModes: ${responseModes.join(', ')}` });
        return;
      case '/mode': {
        const next = responseModes.find((mode) => mode === arg);
        if (next === undefined) {
          addMessage({
            role: 'system',
            content: `Unknown mode '${arg ?? ''}'. Supported: ${responseModes.join(', ')}`,
          });
          return;
        }
        setResponseMode(next);
        addMessage({ role: 'system', content: `✓ Response mode: ${next}` });
        return;
      }
      case '/collections': {
        const collections = listCollections();
        const lines =
          collections.length === 0
            ? ['No collections found.']
            : collections.map((c) => `  ${c.name} (${c.count} documents, ${c.embeddingModel})`);
        addMessage({ role: 'system', content: lines.join('\n') });
        return;
      }
      default:
        addMessage({ role: 'system', content: `Unknown command ${command}. ${HELP_TEXT}` });
    }
  };

  const handleSubmit = async (value: string) => {
    if (!value.trim() || isProcessing) return;

    const userInput = value.trim();
    setInput('');

    if (userInput.startsWith('/')) {
      const [command, arg] = userInput.split(/\s+/, 2);
      handleCommand(command.toLowerCase(), arg);
      return;
    }

    addMessage({ role: 'user', content: userInput, timestamp: new Date() });
    setIsProcessing(true);

    try {
      const answer = await ask(userInput, responseMode);
      addMessage({ role: 'answer', content: answer, timestamp: new Date() });
    } catch (error) {
      addMessage({ role: 'system', content: `Error: ${error instanceof Error ? error.message : error}` });
    }

    setIsProcessing(false);
  };

  useInput((_input, key) => {
    if (key.escape) {
      exit();
    }
    if (key.upArrow && canScrollUp) {
      setScrollOffset((prev) => prev + 1);
    }
    if (key.downArrow && canScrollDown) {
      setScrollOffset((prev) => Math.max(0, prev - 1));
    }
  });

  return (
    <Box flexDirection="column" height={terminalHeight - 1}>
      {/* Header - compact */}
      <Box borderStyle="single" borderColor="cyan" paddingX={1} justifyContent="space-between">
        <Text bold color="cyan">
          {collectionName}
        </Text>
        <Text dimColor>
          {documentCount} docs · {responseMode}
        </Text>
      </Box>

      <Box justifyContent="center" height={1}>
        {canScrollUp ? <Text dimColor>↑ more messages ↑</Text> : <Text> </Text>}
      </Box>

      {/* Messages - fixed height viewport */}
      <Box flexDirection="column" height={messageAreaHeight} overflow="hidden">
        {visibleLines.map((lineData, idx) => (
          <Box key={`${lineData.messageIdx}-${idx}`} flexShrink={0}>
            <LineRow line={lineData.line} role={lineData.role} />
          </Box>
        ))}
      </Box>

      <Box justifyContent="center" height={1}>
        {canScrollDown ? <Text dimColor>↓ newer messages ↓</Text> : <Text> </Text>}
      </Box>

      {/* Input */}
      <Box borderStyle="round" borderColor={isProcessing ? 'yellow' : 'green'} paddingX={1} height={3}>
        {isProcessing ? (
          <Box flexDirection="row" justifyContent="center" alignItems="center">
            <Text color="yellow">{'Querying...'}</Text>
          </Box>
        ) : (
          <Box flexDirection="row">
            <Text color="green" bold>
              {'> '}
            </Text>
            <TextInput value={input} onChange={setInput} onSubmit={(value) => void handleSubmit(value)} placeholder="Question or /help" />
          </Box>
        )}
      </Box>
      <Box>
        <Text dimColor>ESC exit · ↑↓ scroll</Text>
      </Box>
    </Box>
  );
};

const ROLE_COLORS = {
  user: 'green',
  answer: 'blue',
  system: 'yellow',
} as const;

const LineRow: React.FC<{ line: string; role: Message['role'] }> = React.memo(({ line, role }) => (
  <Text color={ROLE_COLORS[role]} dimColor={role === 'system'}>
    {line}
  </Text>
));
