#!/usr/bin/env tsx

// GChat.ts
// ========
// Chat with a language model by editing a plain-text document.
//
// Usage:
//   gchat [-f ./gchat.md] [-m xai:grok-4-0709] [-l 3] [-p 1.0] [-T 600]
//
// The document alternates between sections:
//
//   USER PROMPT:
//   Explain @f:src/main.ts please @t:L4
//
//   GROK RESPONSE:
//   ...
//
//   USER PROMPT:
//
// Every save whose last section is a non-empty USER PROMPT starts a cycle:
//
// 1. The document is parsed into turns and placeholders in user turns are
//    expanded (@f files, @d trees, @t token level, @p temperature). Levels
//    and temperatures carry over to later turns until overridden.
//
// 2. The conversation is sent to the model. A truncated reply is retried at
//    the next token level, up to L5.
//
// 3. If the model answers with exactly "GROK REQUESTS FILES: a, b", the
//    files are attached to the last prompt (only those inside the project
//    root) and the prompt is sent again.
//
// 4. The reply is written back once, followed by a fresh USER PROMPT.
//
// API keys come from XAI_API_KEY (or OPENAI_API_KEY / OPENROUTER_API_KEY),
// or from ~/.config/<vendor>.token.

import { parseConfig } from './Config';
import { fileStore, runCycle } from './Cycle';
import { GenAI, resolveModelSpec } from './GenAI';
import { BOLD, RESET, errorMessage, logError, logStep } from './Log';
import { renderNotification } from './Notify';
import { canonicalRoot } from './Paths';
import { levelToTokens } from './Placeholders';
import { SerialTrigger, watchDocument } from './Watch';

async function main(): Promise<void> {
  const config = parseConfig(process.argv);
  const spec = resolveModelSpec(config.model);
  const client = await GenAI(config.model);
  const root = await canonicalRoot(config.root);
  const store = fileStore(config.chatFile);

  console.log(`${BOLD}gchat${RESET}`);
  console.log(`  Chat file:     ${config.chatFile}`);
  console.log(`  Project root:  ${root}`);
  console.log(`  Model:         ${spec.vendor}:${spec.model}`);
  console.log(`  Max tokens:    L${config.defaultLevel} (${levelToTokens(config.defaultLevel)})`);
  console.log(`  Temperature:   ${config.defaultTemperature}`);
  console.log(`  API timeout:   ${config.timeoutMs / 1000} seconds`);
  console.log(`  Auto tokens:   ${config.autoIncreaseTokens ? 'on' : 'off'}`);
  console.log(`  File requests: ${config.autoFileRequest ? 'on' : 'off'}`);

  const cycle = async (): Promise<void> => {
    const result = await runCycle(store, {
      root,
      client,
      defaultLevel: config.defaultLevel,
      defaultTemperature: config.defaultTemperature,
      autoIncreaseTokens: config.autoIncreaseTokens,
      autoFileRequest: config.autoFileRequest,
      timeoutMs: config.timeoutMs,
    });
    if (result.notification) {
      renderNotification(result.notification, { bell: config.bell });
    }
  };

  const trigger = new SerialTrigger(cycle, err => logError(`Processing error: ${errorMessage(err)}`));
  trigger.trigger();
  await trigger.idle();

  if (config.once) {
    return;
  }

  logStep(`Watching ${config.chatFile} for changes.`);
  const watcher = watchDocument(config.chatFile, () => trigger.trigger());

  process.on('SIGINT', () => {
    watcher.close();
    process.exit(0);
  });
}

main().catch(err => {
  logError(`Fatal: ${errorMessage(err)}`);
  process.exit(1);
});
