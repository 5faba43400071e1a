import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { JobState, JobStatusEvent } from '../models/print-job.model';
import { DEFAULT_PRINT_SETTINGS } from '../models/print-settings.model';
import { FakeRendererFactory, FakeTransport, type FakeDocumentOptions, type FakeTransportOptions } from '../testing/fakes';
import { bufferDocumentSource, type DocumentSource } from './document.service';
import { PrintJobRunner } from './print-job.service';

const PRINTER = '/dev/ttyFAKE';

describe('PrintJobRunner', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'label-job-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function setup(
    doc: FakeDocumentOptions,
    transportOptions: FakeTransportOptions = {},
    document: DocumentSource = bufferDocumentSource('label.png', Buffer.from('fake image bytes')),
    onSleep?: (count: number) => void,
  ) {
    const renderers = new FakeRendererFactory(doc);
    const transport = new FakeTransport(transportOptions);
    const events: JobStatusEvent[] = [];
    const states: JobState[] = [];
    const sleeps: number[] = [];

    const runner = new PrintJobRunner(
      {
        id: 'job-1',
        printerId: PRINTER,
        document,
        settings: { ...DEFAULT_PRINT_SETTINGS, paperWidthMm: 2 },
      },
      {
        rendererFactory: renderers,
        createTransport: () => transport,
        tmpDir,
        settleDelayMs: 250,
        supersample: 1,
        onStatus: (event) => events.push(event),
        onStateChange: (state) => states.push(state),
        sleep: async (ms) => {
          sleeps.push(ms);
          onSleep?.(sleeps.length);
        },
      },
    );
    return { runner, renderers, transport, events, states, sleeps };
  }

  it('prints every page and walks the state machine forward', async () => {
    const { runner, transport, events, states, sleeps, renderers } = setup({ pages: 2 });

    await expect(runner.run()).resolves.toEqual({ kind: 'completed' });

    expect(states).toEqual([
      { kind: 'started' },
      { kind: 'rendering', page: 0 },
      { kind: 'transmitting', page: 0 },
      { kind: 'rendering', page: 1 },
      { kind: 'transmitting', page: 1 },
      { kind: 'completed' },
    ]);
    expect(events).toEqual([
      { type: 'started', jobId: 'job-1' },
      { type: 'pageProgress', jobId: 'job-1', page: 1, total: 2 },
      { type: 'pageProgress', jobId: 'job-1', page: 2, total: 2 },
      { type: 'completed', jobId: 'job-1' },
    ]);
    expect(transport.openedWith).toBe(PRINTER);
    expect(transport.writes).toHaveLength(2);
    expect(sleeps).toEqual([250, 250]);
    expect(runner.heldResources).toEqual([]);
    expect(renderers.closed).toBe(1);
    expect(transport.closeCalls).toBe(1);
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });

  it('writes one TSPL program per page', async () => {
    const { runner, transport } = setup({ pages: 1 });
    await runner.run();

    // 16x8 dots of white at 2mm paper width
    const expected = Buffer.concat([
      Buffer.from('SIZE 2 mm,1 mm\r\nSPEED 3\r\nDENSITY 10\r\nGAP 2 mm,0 mm\r\nCLS\r\nBITMAP 0,0,2,8,0,', 'ascii'),
      Buffer.alloc(16, 0xff),
      Buffer.from('\r\nPRINT 1\r\n', 'ascii'),
    ]);
    expect(transport.writes[0].equals(expected)).toBe(true);
  });

  it('stops at the next page boundary when cancelled during the settle delay', async () => {
    let runner: PrintJobRunner | null = null;
    const ctx = setup({ pages: 5 }, {}, undefined, (count) => {
      if (count === 2) runner?.requestCancel();
    });
    runner = ctx.runner;

    await expect(ctx.runner.run()).resolves.toEqual({ kind: 'cancelled' });

    expect(ctx.transport.writes).toHaveLength(2);
    expect(ctx.runner.currentState).toEqual({ kind: 'cancelled' });
    expect(ctx.events.map((e) => e.type)).toEqual(['started', 'pageProgress', 'pageProgress', 'cancelled']);
    expect(ctx.runner.heldResources).toEqual([]);
    expect(ctx.transport.closeCalls).toBe(1);
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });

  it('cancels before starting without touching the printer', async () => {
    const { runner, transport, events, renderers } = setup({ pages: 3 });
    runner.requestCancel();

    await expect(runner.run()).resolves.toEqual({ kind: 'cancelled' });
    expect(events).toEqual([{ type: 'cancelled', jobId: 'job-1' }]);
    expect(renderers.opened).toEqual([]);
    expect(transport.openedWith).toBeNull();
  });

  it('ignores cancellation once finished', async () => {
    const { runner } = setup({ pages: 1 });
    await runner.run();
    runner.requestCancel();
    expect(runner.currentState).toEqual({ kind: 'completed' });
  });

  it('returns the same outcome from repeated run calls', async () => {
    const { runner, transport } = setup({ pages: 1 });
    const first = runner.run();
    expect(runner.run()).toBe(first);
    await first;
    expect(transport.writes).toHaveLength(1);
  });

  it('fails when the printer cannot be opened and still releases everything', async () => {
    const { runner, transport, events } = setup({ pages: 2 }, { openResult: false });

    await expect(runner.run()).resolves.toEqual({ kind: 'failed', reason: `Cannot connect to printer: ${PRINTER}` });
    expect(transport.writes).toHaveLength(0);
    expect(transport.closeCalls).toBe(1);
    expect(runner.heldResources).toEqual([]);
    expect(events[events.length - 1]).toEqual({
      type: 'failed',
      jobId: 'job-1',
      message: `Cannot connect to printer: ${PRINTER}`,
    });
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });

  it('fails on an empty document', async () => {
    const { runner, renderers, transport } = setup(
      { pages: 1 },
      {},
      bufferDocumentSource('empty.png', Buffer.alloc(0)),
    );

    await expect(runner.run()).resolves.toEqual({ kind: 'failed', reason: 'Document "empty.png" is empty' });
    expect(renderers.opened).toEqual([]);
    expect(transport.openedWith).toBeNull();
  });

  it('fails on a document without pages', async () => {
    const { runner, renderers, transport } = setup({ pages: 0 });

    await expect(runner.run()).resolves.toEqual({ kind: 'failed', reason: 'Document "label.png" has no pages' });
    expect(renderers.closed).toBe(1);
    expect(transport.openedWith).toBeNull();
  });

  it('fails the job when a page cannot be rendered', async () => {
    const { runner, transport } = setup({ pages: 3, failOnPage: 1 });

    await expect(runner.run()).resolves.toEqual({
      kind: 'failed',
      reason: 'Cannot render page 2: glyph cache exhausted',
    });
    expect(transport.writes).toHaveLength(1);
    expect(runner.heldResources).toEqual([]);
  });

  it('fails when a write is rejected', async () => {
    const { runner, events } = setup({ pages: 3 }, { failOnWrite: 1 });

    await expect(runner.run()).resolves.toEqual({
      kind: 'failed',
      reason: `Write to printer ${PRINTER} failed on page 1`,
    });
    expect(events.map((e) => e.type)).toEqual(['started', 'failed']);
  });

  it('fails when the device takes no bitmaps', async () => {
    const { runner, transport } = setup(
      { pages: 1 },
      { capabilities: { blackMarkSensing: true, bitmapTransfer: 'none' } },
    );

    await expect(runner.run()).resolves.toEqual({ kind: 'failed', reason: 'Printer does not accept bitmap data' });
    expect(transport.writes).toHaveLength(0);
    expect(transport.closeCalls).toBe(1);
  });

  it('uses the default sleep when none is injected', async () => {
    const transport = new FakeTransport();
    const runner = new PrintJobRunner(
      { id: 'job-2', printerId: PRINTER, document: bufferDocumentSource('a.png', Buffer.from('x')), settings: DEFAULT_PRINT_SETTINGS },
      { rendererFactory: new FakeRendererFactory({ pages: 1 }), createTransport: () => transport, tmpDir, settleDelayMs: 0, supersample: 2 },
    );
    await expect(runner.run()).resolves.toEqual({ kind: 'completed' });
    expect(transport.writes[0].toString('latin1').startsWith('SIZE 78 mm,39 mm\r\n')).toBe(true);
  });
});
