import React, { useState, useEffect } from 'react';
import { Box, useApp } from 'ink';
import { ragChat } from '../llm/rag-chat';
import { ragService } from '../core/rag-service';
import { config } from '../config';
import { errorMessage } from '../core/errors';
import { formatSources, parseInput, resolveDocumentPath } from './commands';
import { ChatView } from './components/ChatView';
import { Input } from './components/Input';
import { StatusBar } from './components/StatusBar';
import type { IngestResponse } from '../types';

export interface Message {
  role: 'user' | 'assistant';
  content: string;
  sources?: string;
}

export type Phase = 'path' | 'indexing' | 'ready';

interface AppProps {
  documentPath?: string;
}

export function App({ documentPath }: AppProps) {
  const { exit } = useApp();
  const [phase, setPhase] = useState<Phase>(documentPath ? 'indexing' : 'path');
  const [messages, setMessages] = useState<Message[]>(
    documentPath
      ? []
      : [{ role: 'assistant', content: `Enter the path to a PDF (press Enter for ${config.rag.defaultDocument}):` }]
  );
  const [document, setDocument] = useState<IngestResponse | null>(null);
  const [isProcessing, setIsProcessing] = useState(false);

  const addMessage = (message: Message) => setMessages(prev => [...prev, message]);

  // Index the document passed on the command line
  useEffect(() => {
    if (documentPath) {
      ingest(documentPath);
    }
  }, []);

  const ingest = (filePath: string) => {
    setPhase('indexing');
    addMessage({ role: 'assistant', content: `Indexing document: ${filePath}...` });

    ragService
      .ingest(filePath)
      .then(result => {
        ragChat.attach(ragService.index);
        setDocument(result);
        setPhase('ready');
        addMessage({
          role: 'assistant',
          content:
            `${result.reused ? 'Loaded saved index' : 'Document indexed'}: ${result.title}\n` +
            `Pages: ${result.pageCount} | Chunks: ${result.chunkCount} | Processing time: ${result.processingTime}ms\n\n` +
            `Ask a question about the document. Type quit, exit or q to leave.`
        });
      })
      .catch((error: unknown) => {
        // Startup failures end the session; index.tsx reports them
        exit(error instanceof Error ? error : new Error(errorMessage(error)));
      });
  };

  const ask = async (question: string) => {
    setIsProcessing(true);
    addMessage({ role: 'user', content: question });

    try {
      const result = await ragChat.ask(question);
      addMessage({ role: 'assistant', content: result.answer, sources: formatSources(result.chunks) });
    } catch (error) {
      addMessage({ role: 'assistant', content: `Error: ${errorMessage(error)}` });
    } finally {
      setIsProcessing(false);
    }
  };

  const handleSubmit = (line: string) => {
    const input = parseInput(line);

    if (input.kind === 'quit') {
      ragChat.reset();
      addMessage({ role: 'assistant', content: 'Goodbye!' });
      exit();
      return;
    }

    if (phase === 'path') {
      ingest(resolveDocumentPath(line, config.rag.defaultDocument));
      return;
    }

    if (phase === 'ready' && input.kind === 'question') {
      void ask(input.text);
    }
  };

  return (
    <Box flexDirection="column">
      <Box flexGrow={1} flexDirection="column">
        <ChatView messages={messages} />
      </Box>
      <StatusBar
        model={ragChat.model}
        document={document?.title ?? null}
        chunkCount={document?.chunkCount ?? 0}
        phase={phase}
        isProcessing={isProcessing}
      />
      <Input onSubmit={handleSubmit} isDisabled={isProcessing || phase === 'indexing'} phase={phase} />
    </Box>
  );
}
