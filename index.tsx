#!/usr/bin/env tsx

import 'dotenv/config';
import { render } from 'ink';
import React from 'react';
import { config } from './src/config';
import { errorMessage } from './src/core/errors';
import { chatClient } from './src/llm/client';

async function main() {
  try {
    // Validate config before any service is constructed
    config.validate();
  } catch (error) {
    console.error(`❌ ${errorMessage(error)}`);
    process.exit(1);
  }

  console.log('Initializing docchat...\n');

  process.stdout.write('Checking OpenAI API... ');
  const healthy = await chatClient.checkHealth();
  if (!healthy) {
    console.error('❌');
    console.error(`\n❌ Could not reach the OpenAI API with model ${config.openai.model}`);
    console.error('Check OPENAI_API_KEY, OPENAI_BASE_URL and OPENAI_MODEL in your .env file');
    process.exit(1);
  }
  console.log('\x1b[32m✓\x1b[0m');

  console.log(`\nModel: ${config.openai.model}`);
  console.log(`Embeddings: ${config.rag.embeddingModel}`);
  console.log(`Vector store: ${config.rag.vectorStore}\n`);

  const { App } = await import('./src/tui/app');
  const documentPath = process.argv[2];

  try {
    const app = render(<App documentPath={documentPath} />);
    await app.waitUntilExit();
    process.exit(0);
  } catch (error) {
    console.error(`\n❌ ${errorMessage(error)}`);
    process.exit(1);
  }
}

main().catch(error => {
  console.error('Failed to start application:', error);
  process.exit(1);
});
