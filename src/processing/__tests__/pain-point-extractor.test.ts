import { describe, expect, it } from 'vitest';
import { extracted, ScriptedExtractionAdapter } from '../../__tests__/factories';
import { AdapterUnavailable, ParseError, SessionCancelled } from '../../errors';
import type { ExtractionInput, PainPointDraft } from '../../types';
import type { ExtractionAdapter } from '../extraction-adapter';
import type { ExtractionOutcome } from '../pain-point-schema';
import { PainPointExtractor } from '../pain-point-extractor';

const items: ExtractionInput[] = [
  { id: 'reddit_1', content: 'checkout crashes', metadata: { engagementScore: 120, commentCount: 30 } },
  { id: 'reddit_2', content: 'just sharing a photo' },
  { id: 'reddit_3', content: 'api down' },
  { id: 'reddit_4', content: 'no dark mode' },
];

/**
 * Adapter whose reply for a given text is produced by a callback, so a test
 * can hang, abort or fail in the middle of a call.
 */
class CallbackExtractionAdapter implements ExtractionAdapter {
  readonly name = 'callback';
  readonly calls: string[] = [];

  constructor(private reply: (text: string, signal?: AbortSignal) => Promise<ExtractionOutcome>) {}

  extract(text: string, signal?: AbortSignal): Promise<ExtractionOutcome> {
    this.calls.push(text);
    return this.reply(text, signal);
  }
}

const adapter = () =>
  new ScriptedExtractionAdapter({
    'checkout crashes': extracted('Checkout crashes on submit', 'reliability', 'critical'),
    'just sharing a photo': { ok: false, error: new ParseError('Could not find JSON in extraction reply') },
    'no dark mode': extracted('No dark mode', 'features', 'low'),
  });

describe('PainPointExtractor', () => {
  it('scores a parsed reply with the item metadata', async () => {
    const draft = await new PainPointExtractor(adapter(), 1000).extract(items[0]);

    expect(draft).toMatchObject({
      rawItemId: 'reddit_1',
      problemStatement: 'Checkout crashes on submit',
      category: 'reliability',
      severity: 'critical',
      opportunityScore: 98,
    });
  });

  it('skips malformed replies and adapter errors without stopping the batch', async () => {
    const scripted = adapter();
    const drafts = await new PainPointExtractor(scripted, 1000).extractBatch(items);

    expect(drafts.map((draft) => draft.rawItemId)).toEqual(['reddit_1', 'reddit_4']);
    expect(drafts[1].opportunityScore).toBe(55);
    expect(scripted.calls).toHaveLength(4);
  });

  it('hands each draft to onDraft before the next item', async () => {
    const seen: string[] = [];
    const scripted = adapter();

    await new PainPointExtractor(scripted, 1000).extractBatch(items, {
      onDraft: async (draft: PainPointDraft) => {
        seen.push(`${draft.rawItemId}@${scripted.calls.length}`);
      },
    });

    expect(seen).toEqual(['reddit_1@1', 'reddit_4@4']);
  });

  it('throws SessionCancelled when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      new PainPointExtractor(adapter(), 1000).extractBatch(items, { signal: controller.signal })
    ).rejects.toBeInstanceOf(SessionCancelled);
  });

  it('stops before the next item once aborted', async () => {
    const controller = new AbortController();
    const scripted = adapter();
    const seen: string[] = [];

    await expect(
      new PainPointExtractor(scripted, 1000).extractBatch(items, {
        signal: controller.signal,
        onDraft: async (draft) => {
          seen.push(draft.rawItemId);
          controller.abort();
        },
      })
    ).rejects.toThrow('Extraction session cancelled');

    expect(seen).toEqual(['reddit_1']);
    expect(scripted.calls).toEqual(['checkout crashes']);
  });

  it('propagates onDraft failures', async () => {
    await expect(
      new PainPointExtractor(adapter(), 1000).extractBatch(items, {
        onDraft: async () => {
          throw new Error('disk full');
        },
      })
    ).rejects.toThrow('disk full');
  });

  it('skips an item whose adapter call times out and extracts the next one', async () => {
    const hanging = new CallbackExtractionAdapter((text) =>
      text === 'checkout crashes'
        ? new Promise<ExtractionOutcome>(() => undefined)
        : Promise.resolve(extracted('No dark mode', 'features', 'low'))
    );

    const drafts = await new PainPointExtractor(hanging, 10).extractBatch([items[0], items[3]]);

    expect(drafts.map((draft) => draft.rawItemId)).toEqual(['reddit_4']);
    expect(hanging.calls).toEqual(['checkout crashes', 'no dark mode']);
  });

  it('throws SessionCancelled when aborted while the last item is in flight', async () => {
    const controller = new AbortController();
    const seen: string[] = [];
    const aborting = new CallbackExtractionAdapter(async (_text, signal) => {
      controller.abort();
      expect(signal).toBe(controller.signal);
      return extracted('Checkout crashes on submit', 'reliability', 'critical');
    });

    await expect(
      new PainPointExtractor(aborting, 1000).extractBatch([items[0]], {
        signal: controller.signal,
        onDraft: async (draft) => {
          seen.push(draft.rawItemId);
        },
      })
    ).rejects.toBeInstanceOf(SessionCancelled);

    expect(seen).toEqual(['reddit_1']);
    expect(aborting.calls).toEqual(['checkout crashes']);
  });

  it('stops the batch when the adapter becomes unavailable', async () => {
    const rejecting = new CallbackExtractionAdapter(async (text) => {
      if (text === 'api down') {
        throw new AdapterUnavailable('Anthropic rejected the API key: invalid x-api-key');
      }
      return extracted('Checkout crashes on submit', 'reliability', 'critical');
    });

    await expect(
      new PainPointExtractor(rejecting, 1000).extractBatch([items[0], items[2], items[3]])
    ).rejects.toThrow('Anthropic rejected the API key: invalid x-api-key');

    expect(rejecting.calls).toEqual(['checkout crashes', 'api down']);
  });
});
