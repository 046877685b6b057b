import { test, expect } from '@playwright/test';
import fs from 'fs';
import { builtinCatalog } from '../src/catalog';
import { ConfigurationError } from '../src/errors';
import { analyzeLogFile, SignatureExtractor, textLines } from '../src/extractor';
import { writeFixture } from './fixtures';

const extractor = new SignatureExtractor(builtinCatalog());

test.describe('SignatureExtractor', () => {
  test('keeps the highest-severity line of the whole log', async () => {
    const outcome = await extractor.analyze(['start', 'Error: something bad', 'Segmentation fault', 'Error: again'], {
      suite: 'mem',
      test: 'alloc_stress',
    });
    expect(outcome.kind).toBe('found');
    if (outcome.kind !== 'found') return;
    expect(outcome.signature).toEqual({
      suite: 'mem',
      test: 'alloc_stress',
      line_number: 3,
      line_offset: 27,
      matched_text: 'Segmentation fault',
      error_level: 10,
      pattern_tag: 'builtin:segfault',
      tool_name: undefined,
      lines_scanned: 4,
      keywords: ['segmentation', 'fault'],
      context: ['start', 'Error: something bad'],
    });
  });

  test('equal levels keep the earliest line', async () => {
    const outcome = await extractor.analyze(textLines('Error: first problem\nError: second problem\n'));
    expect(outcome.kind === 'found' && outcome.signature.line_number).toBe(1);
    expect(outcome.kind === 'found' && outcome.signature.matched_text).toBe('Error: first problem');
  });

  test('a log of ignored lines has no signature', async () => {
    const outcome = await extractor.analyze(['UVM_ERROR :    0', 'UVM_FATAL :    0'], { test: 'smoke' });
    expect(outcome).toEqual({
      kind: 'not-found',
      reason: 'no error-level line found',
      suite: 'unknown',
      test: 'smoke',
      tool_name: undefined,
      unmatched_lines: [],
      lines_scanned: 2,
    });
  });

  test('maxLines stops the scan', async () => {
    const outcome = await extractor.analyze(['ok', 'ok', 'Error: late'], { maxLines: 2 });
    expect(outcome.kind).toBe('not-found');
    if (outcome.kind !== 'not-found') return;
    expect(outcome.reason).toBe('did not find error in first 2 lines');
    expect(outcome.lines_scanned).toBe(2);
  });

  test('endsOnly scans the head and the tail', async () => {
    await test.step('middle line is skipped', async () => {
      const outcome = await extractor.analyze(['head', 'Error: middle', 'tail'], { endsOnly: 1 });
      expect(outcome.kind === 'not-found' && outcome.reason).toBe('did not find error in first/last 1 lines');
    });
    await test.step('last line is still seen', async () => {
      const outcome = await extractor.analyze(['head', 'noise', 'Segmentation fault'], { endsOnly: 1 });
      expect(outcome.kind === 'found' && outcome.signature.line_number).toBe(3);
    });
  });

  test('maxLines and endsOnly together are a configuration error', async () => {
    await expect(extractor.analyze(['x'], { maxLines: 1, endsOnly: 1 })).rejects.toThrow(ConfigurationError);
    await expect(extractor.analyze(['x'], { maxLines: 1.5 })).rejects.toThrow(ConfigurationError);
    await expect(extractor.analyze(['x'], { maxLines: 0 })).rejects.toThrow(/maxLines must be a positive integer, got 0/);
  });

  test('an absent source degrades to the test name', async () => {
    const outcome = await extractor.analyze(null, { test: 'test_memory_allocation' });
    expect(outcome).toEqual({
      kind: 'unavailable',
      signature: {
        suite: 'unknown',
        test: 'test_memory_allocation',
        keywords: ['memory', 'allocation'],
        degraded: true,
        reason: 'log source unavailable',
      },
    });
  });

  test('action lines fill in suite, test and tool', async () => {
    const outcome = await extractor.analyze(['# action: gc(run)::dma/basic_copy.vcs', 'Segmentation fault']);
    expect(outcome.kind).toBe('found');
    if (outcome.kind !== 'found') return;
    expect(outcome.signature.suite).toBe('dma');
    expect(outcome.signature.test).toBe('basic_copy');
    expect(outcome.signature.tool_name).toBe('vcs');
  });

  test('tool markers are captured independently of errors', async () => {
    const outcome = await extractor.analyze(['dv: ... running tool synth', 'Error: bad netlist']);
    expect(outcome.kind === 'found' && outcome.signature.tool_name).toBe('synth');
  });

  test('warnings count once the compiler promotes them', async () => {
    const warning = 'foo.c:3: warning: unused variable';
    const plain = await extractor.analyze([warning]);
    expect(plain.kind).toBe('not-found');

    const promoted = await extractor.analyze(['cc1plus: warnings being treated as errors', warning]);
    expect(promoted.kind).toBe('found');
    if (promoted.kind !== 'found') return;
    expect(promoted.signature.error_level).toBe(3);
    expect(promoted.signature.pattern_tag).toBe('builtin:warning');
    expect(promoted.signature.line_number).toBe(2);
  });

  test('error-looking lines no rule knows are collected', async () => {
    const outcome = await extractor.analyze(['Cannot open device /dev/x', 'all fine']);
    expect(outcome.kind === 'not-found' && outcome.unmatched_lines).toEqual(['Cannot open device /dev/x']);
  });

  test('context holds the ten preceding lines', async () => {
    const lines = Array.from({ length: 12 }, (_, i) => `step ${i + 1}`);
    const outcome = await extractor.analyze([...lines, 'Segmentation fault']);
    expect(outcome.kind === 'found' && outcome.signature.context).toEqual(lines.slice(2));
  });

  test('reads async sources', async () => {
    async function* source() {
      yield 'booting';
      yield 'Error: link training failed';
    }
    const outcome = await extractor.analyze(source());
    expect(outcome.kind === 'found' && outcome.signature.line_number).toBe(2);
  });

  test('log files on disk', async ({}, testInfo) => {
    await test.step('missing file degrades', async () => {
      const outcome = await analyzeLogFile(extractor, testInfo.outputPath('nope.log'), { test: 'tc_dma_basic' });
      expect(outcome.kind).toBe('unavailable');
      if (outcome.kind !== 'unavailable') return;
      expect(outcome.signature.reason).toContain('ENOENT');
      expect(outcome.signature.keywords).toEqual(['dma', 'basic']);
    });
    await test.step('readable file is scanned lazily', async () => {
      const file = await writeFixture(testInfo.outputPath('run.log'), ['boot ok', 'ASSERTION FAILED in fifo', 'done']);
      const outcome = await analyzeLogFile(extractor, file);
      expect(outcome.kind).toBe('found');
      if (outcome.kind !== 'found') return;
      expect(outcome.signature.error_level).toBe(8);
      expect(outcome.signature.line_offset).toBe(8);
    });
    await test.step('offsets count the bytes on disk', async () => {
      const crlf = await writeFixture(testInfo.outputPath('crlf.log'), 'boot ok\r\nnoise\r\nSegmentation fault\r\n');
      const outcome = await analyzeLogFile(extractor, crlf);
      expect(outcome.kind === 'found' && outcome.signature).toMatchObject({
        line_number: 3,
        line_offset: 16,
        matched_text: 'Segmentation fault',
      });

      const binary = testInfo.outputPath('binary.log');
      await fs.promises.writeFile(binary, Buffer.concat([Buffer.from([0xff, 0xfe, 0x0a]), Buffer.from('Segmentation fault\n')]));
      const decoded = await analyzeLogFile(extractor, binary);
      expect(decoded.kind === 'found' && decoded.signature.line_offset).toBe(3);
    });
  });

  test('text with CRLF line ends keeps byte offsets', async () => {
    const lines = textLines('boot ok\r\nSegmentation fault\r\n');
    expect(lines).toEqual([{ text: 'boot ok', offset: 0 }, { text: 'Segmentation fault', offset: 9 }]);
    const outcome = await extractor.analyze(lines);
    expect(outcome.kind === 'found' && outcome.signature.line_offset).toBe(9);
  });
});
