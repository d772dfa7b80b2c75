/**
 * Tests for the CLI commands
 *
 * Commands run against a real orchestrator and engine; processes are
 * scripted through the mock process manager.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import stripAnsi from 'strip-ansi';
import { InvalidArgumentError } from 'commander';
import { Catalog } from '@/catalog/catalog.js';
import { DiscoveryError } from '@/discovery/errors.js';
import { EmbeddingIndex } from '@/embedding/embedding-index.js';
import { InMemoryVectorStore } from '@/embedding/stores/memory-store.js';
import { WorkflowEngine } from '@/engine/workflow-engine.js';
import type { ExecutionResult } from '@/engine/types.js';
import { Orchestrator } from '@/orchestrator/orchestrator.js';
import { listCommand } from '@/cli/commands/list.js';
import { searchCommand } from '@/cli/commands/search.js';
import { exitCodeFor, parseInputs, runCommand, toSelection } from '@/cli/commands/run.js';
import { parseNonNegativeInt, parsePositiveInt, resolveConfig } from '@/cli/bootstrap.js';
import { MockProcessManager } from '../../engine/mock-process-manager.js';
import { VocabularyEmbeddingProvider } from '../../../helpers/vocabulary-provider.js';
import { lectureCatalog } from '../../../helpers/lecture-catalog.js';
import { agent } from '../../../helpers/descriptors.js';

class Collector {
  readonly lines: string[] = [];

  log(text: string): void {
    this.lines.push(text);
  }

  get text(): string {
    return stripAnsi(this.lines.join('\n'));
  }
}

describe('parseInputs', () => {
  it('splits at the first equals sign', () => {
    expect(parseInputs(['audioFile=/tmp/a.wav', 'pair=a=b', 'empty='])).toEqual({
      audioFile: '/tmp/a.wav',
      pair: 'a=b',
      empty: '',
    });
  });

  it('rejects entries without a name', () => {
    expect(() => parseInputs(['=x'])).toThrow(InvalidArgumentError);
    expect(() => parseInputs(['novalue'])).toThrow("Expected name=value, got 'novalue'.");
  });

  it('returns no values without inputs', () => {
    expect(parseInputs()).toEqual({});
  });
});

describe('option parsers', () => {
  it('accepts positive integers', () => {
    expect(parsePositiveInt('4')).toBe(4);
    expect(() => parsePositiveInt('0')).toThrow('Expected a positive integer.');
    expect(() => parsePositiveInt('1.5')).toThrow('Expected a positive integer.');
  });

  it('accepts non-negative integers', () => {
    expect(parseNonNegativeInt('0')).toBe(0);
    expect(() => parseNonNegativeInt('-1')).toThrow('Expected a non-negative integer.');
  });
});

describe('resolveConfig', () => {
  it('lets defined flags override the environment', () => {
    const root = tmpdir();
    const config = resolveConfig(
      { targetLanguage: 'de', maxParallelSteps: undefined },
      { AGENT_CATALOG_ROOT: root, AGENT_MAX_PARALLEL_STEPS: '3' },
    );

    expect(config.targetLanguage).toBe('de');
    expect(config.maxParallelSteps).toBe(3);
  });
});

describe('commands', () => {
  let outputRoot: string;
  let processes: MockProcessManager;
  let orchestrator: Orchestrator;

  function build(catalog: Catalog, discoveryErrors: DiscoveryError[] = []): Orchestrator {
    return new Orchestrator({
      catalog,
      engine: new WorkflowEngine(processes, { outputRoot }),
      index: new EmbeddingIndex(new VocabularyEmbeddingProvider(), new InMemoryVectorStore(), { catalog }),
      discoveryErrors,
    });
  }

  beforeEach(async () => {
    outputRoot = await mkdtemp(path.join(tmpdir(), 'cli-commands-'));
    processes = new MockProcessManager();
    orchestrator = build(lectureCatalog());
  });

  afterEach(async () => {
    await orchestrator.close();
    await rm(outputRoot, { recursive: true, force: true });
  });

  describe('toSelection', () => {
    it('treats a catalog name as a name, ignoring case and whitespace', () => {
      expect(toSelection(orchestrator, ' speech translator ')).toEqual({ name: 'speech translator' });
    });

    it('treats anything else as an intent', () => {
      expect(toSelection(orchestrator, 'translate my audio')).toEqual({ intent: 'translate my audio' });
    });
  });

  describe('listCommand', () => {
    it('renders the catalog as JSON', () => {
      const parsed: unknown = JSON.parse(listCommand(orchestrator, { format: 'json' }));

      expect(Array.isArray(parsed) && parsed.map((item: { name: string }) => item.name)).toEqual([
        'Lecture Notes',
        'Speech Translator',
        'Whiteboard OCR',
      ]);
    });

    it('lists skipped manifests after the table', async () => {
      await orchestrator.close();
      orchestrator = build(lectureCatalog(), [
        DiscoveryError.invalidManifest('/catalog/agents/broken/agent.json', 'name: Required'),
      ]);

      const lines = listCommand(orchestrator).split('\n');

      expect(lines.slice(-2)).toEqual([
        'Skipped manifests (1):',
        '  /catalog/agents/broken/agent.json: Invalid manifest: name: Required',
      ]);
    });
  });

  describe('searchCommand', () => {
    it('returns ranked matches as JSON', async () => {
      const output: unknown = JSON.parse(await searchCommand(orchestrator, 'whiteboard', { top: 1, format: 'json' }));

      expect(output).toEqual({
        strategy: 'semantic',
        matches: [{ name: 'Whiteboard OCR', kind: 'agent', score: expect.closeTo(1 / Math.sqrt(3), 10) }],
      });
    });

    it('renders matches as text', async () => {
      const output = stripAnsi(await searchCommand(orchestrator, 'whiteboard', { top: 1 }));

      expect(output.split('\n')).toEqual(['Matches (semantic):', '  1. Whiteboard OCR  agent     0.577']);
    });
  });

  describe('runCommand', () => {
    const transcriber = agent('Transcriber', {
      executablePath: 'transcribe',
      arguments: ['{{audioFile}}', '--out', '{{stepOutputDir}}'],
      description: 'Transcribes speech audio',
    });
    const broken = agent('Broken', { executablePath: 'broken' });

    beforeEach(async () => {
      await orchestrator.close();
      orchestrator = build(new Catalog([transcriber, broken]));
      processes
        .script('transcribe', { stdout: ['done'] })
        .script('broken', { exitCode: 2, stderr: 'model missing\n' });
    });

    it('runs a named agent with inputs and prints the result as JSON', async () => {
      const output = new Collector();

      const { exitCode, result } = await runCommand(
        orchestrator,
        'Transcriber',
        { format: 'json', input: ['audioFile=/tmp/lecture.wav'] },
        undefined,
        output,
      );

      expect(exitCode).toBe(0);
      expect(processes.spawnedFor('transcribe')?.args.slice(0, 2)).toEqual(['/tmp/lecture.wav', '--out']);
      expect(output.lines).toHaveLength(1);
      const printed: unknown = JSON.parse(output.lines[0] ?? '');
      expect(printed).toMatchObject({ target: 'Transcriber', kind: 'agent', status: 'succeeded' });
      expect(result?.status).toBe('succeeded');
    });

    it('prints a header, one line per step and a summary', async () => {
      const output = new Collector();

      await runCommand(orchestrator, 'Transcriber', { input: ['audioFile=/tmp/a.wav'] }, undefined, output);

      expect(output.lines).toHaveLength(3);
      expect(stripAnsi(output.lines[0] ?? '')).toContain('Run: Transcriber (agent)');
      expect(stripAnsi(output.lines[1] ?? '')).toMatch(/^\[OK\] 1\. Transcriber \(\d+ms\)$/);
      expect(stripAnsi(output.lines[2] ?? '')).toContain('[OK] Transcriber completed successfully');
    });

    it('exits with 1 when a step fails', async () => {
      const output = new Collector();

      const { exitCode, result } = await runCommand(orchestrator, 'Broken', { format: 'json' }, undefined, output);

      expect(exitCode).toBe(1);
      expect(result?.failedStep?.diagnostic).toBe('Exited with code 2\nmodel missing');
    });

    it('re-runs the invocation after a step failure when retries are allowed', async () => {
      const output = new Collector();

      const { exitCode } = await runCommand(
        orchestrator,
        'Broken',
        { retries: 1, retryDelay: 0 },
        undefined,
        output,
      );

      expect(exitCode).toBe(1);
      expect(processes.spawned.map((config) => config.executablePath)).toEqual(['broken', 'broken']);
      expect(output.text).toContain('[!] Retrying (1/1) in 0ms');
    });

    it('runs the best match for an intent', async () => {
      const { exitCode, result } = await runCommand(
        orchestrator,
        'turn this speech audio into text',
        { format: 'json', input: ['audioFile=/tmp/a.wav'] },
        undefined,
        new Collector(),
      );

      expect(exitCode).toBe(0);
      expect(result?.target).toBe('Transcriber');
      expect(processes.spawned.map((config) => config.executablePath)).toEqual(['transcribe']);
    });
  });

  describe('exitCodeFor', () => {
    it('maps statuses to exit codes', () => {
      const result = (status: ExecutionResult['status']): ExecutionResult => ({
        target: 'x',
        kind: 'agent',
        invocationId: 'run-x',
        steps: [],
        artifacts: [],
        outputDir: '/out',
        startedAt: new Date(0),
        completedAt: new Date(0),
        durationMs: 0,
        status,
      });

      expect(exitCodeFor(result('succeeded'))).toBe(0);
      expect(exitCodeFor(result('failed'))).toBe(1);
      expect(exitCodeFor(result('cancelled'))).toBe(130);
    });
  });
});
