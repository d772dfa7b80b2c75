/**
 * Integration Tests against the example catalog
 *
 * Discovers examples/catalog, then runs its workflows end to end with
 * real processes.
 */

import { describe, it, beforeAll, afterAll, expect } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { loadConfig } from '@/config/index.js';
import { createOrchestrator } from '@/orchestrator/factory.js';
import type { EngineEvent } from '@/engine/types.js';
import type { Orchestrator } from '@/orchestrator/orchestrator.js';

const catalogRoot = fileURLToPath(new URL('../../../examples/catalog', import.meta.url));

describe('Example catalog', () => {
  let outputRoot: string;
  let orchestrator: Orchestrator;

  beforeAll(async () => {
    outputRoot = await mkdtemp(path.join(tmpdir(), 'example-catalog-'));
    orchestrator = await createOrchestrator(
      loadConfig({ AGENT_CATALOG_ROOT: catalogRoot, AGENT_OUTPUT_ROOT: outputRoot }),
    );
  });

  afterAll(async () => {
    await orchestrator.close();
    await rm(outputRoot, { recursive: true, force: true });
  });

  it('discovers every agent and workflow without errors', () => {
    expect(orchestrator.getDiscoveryErrors()).toEqual([]);
    expect(orchestrator.listCatalog().map((entry) => [entry.kind, entry.descriptor.name])).toEqual([
      ['workflow', 'Lecture Notes'],
      ['workflow', 'Translated Lecture Notes'],
      ['agent', 'Lecture Summarizer'],
      ['agent', 'Phrase Translator'],
      ['agent', 'Speech Transcriber'],
      ['agent', 'Text Translator'],
      ['agent', 'Whiteboard OCR'],
    ]);
  });

  it('builds lecture notes from the bundled samples', async () => {
    const result = await orchestrator.run({ name: 'Lecture Notes' }, { invocationId: 'run-notes' });

    const outputDir = path.join(outputRoot, 'lecture-notes-run-notes');
    const notes = path.join(outputDir, '03-lecture-summarizer', 'notes.md');
    expect(result.status).toBe('succeeded');
    expect(result.steps.map((step) => step.stage)).toEqual([0, 0, 1]);
    expect(result.artifacts).toEqual([
      path.join(outputDir, 'transcript'),
      path.join(outputDir, 'boardText'),
      notes,
    ]);
    expect(await readFile(notes, 'utf8')).toBe(
      [
        '# Lecture notes (en)',
        '',
        'Transcript (language: auto)',
        'Today we cover binary search trees: insertion, lookup and in-order traversal.',
        '',
        'board-1.txt',
        '',
      ].join('\n'),
    );
  });

  it('translates the notes in a longer workflow', async () => {
    const result = await orchestrator.run({ name: 'Translated Lecture Notes' }, { invocationId: 'run-es' });

    const translated = path.join(outputRoot, 'translated-lecture-notes-run-es', '04-text-translator', 'notes.en.md');
    expect(result.status).toBe('succeeded');
    expect(result.artifacts.at(-1)).toBe(translated);
    expect((await readFile(translated, 'utf8')).split('\n')[0]).toBe('<!-- translated to en -->');
  });

  it('fails a standalone agent whose inputs were not supplied', async () => {
    const result = await orchestrator.run({ name: 'Speech Transcriber' });

    expect(result.status).toBe('failed');
    expect(result.failedStep?.diagnostic).toBe('Unresolved placeholders: {{transcript}}');
  });

  describe('with the phrasebook translator', () => {
    let localized: Orchestrator;

    beforeAll(async () => {
      localized = await createOrchestrator(
        loadConfig({
          AGENT_CATALOG_ROOT: catalogRoot,
          AGENT_OUTPUT_ROOT: outputRoot,
          AGENT_TARGET_LANGUAGE: 'es',
          AGENT_SOURCE_LANGUAGE: 'fr',
        }),
      );
    });

    afterAll(async () => {
      await localized.close();
    });

    it('localizes status messages into the target language', async () => {
      expect(await localized.localize('Workflow completed')).toBe('Flujo de trabajo completado');
      expect(await localized.localize('Not in the phrasebook')).toBe('Not in the phrasebook');
    });

    it('translates an intent into English before searching', async () => {
      const events: EngineEvent[] = [];
      const unsubscribe = localized.getEngine().onEvent((event) => events.push(event));

      try {
        await localized.findRelevant('resume mon cours');
      } finally {
        unsubscribe();
      }

      const stdout = events.flatMap((event) =>
        event.type === 'step:output' && event.stream === 'stdout' && event.name === 'Phrase Translator'
          ? [event.data]
          : [],
      );
      expect(stdout.join('')).toBe('summarize my lecture\n');
    });
  });
});
