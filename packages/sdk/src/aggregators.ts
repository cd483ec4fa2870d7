import type { ErrorMessage, TranscriptionMessage } from '@streamscribe/shared-types';

export interface TranscriptAggregationResult {
  finalizedText: string;
  pendingText: string;
}

/**
 * Composes the running transcript from per-sequence messages. A final
 * replaces the interim text of its sequence; an error finalizes the sequence
 * as empty.
 */
export class TranscriptAccumulator {
  private readonly finals = new Map<number, string>();
  private readonly pending = new Map<number, string>();

  ingest(message: TranscriptionMessage | ErrorMessage): TranscriptAggregationResult | null {
    if (message.type === 'error') {
      if (message.sequence === undefined) {
        return null;
      }
      const dropped = this.pending.delete(message.sequence);
      return dropped ? this.snapshot() : null;
    }

    const trimmed = message.text.trim();
    let mutated = false;

    if (message.isFinal) {
      if (this.pending.delete(message.sequence)) {
        mutated = true;
      }
      if (trimmed && this.finals.get(message.sequence) !== trimmed) {
        this.finals.set(message.sequence, trimmed);
        mutated = true;
      }
      return mutated ? this.snapshot() : null;
    }

    if (this.finals.has(message.sequence)) {
      return null;
    }
    if (!trimmed) {
      return this.pending.delete(message.sequence) ? this.snapshot() : null;
    }
    if (this.pending.get(message.sequence) === trimmed) {
      return null;
    }
    this.pending.set(message.sequence, trimmed);
    return this.snapshot();
  }

  reset(): void {
    this.finals.clear();
    this.pending.clear();
  }

  private snapshot(): TranscriptAggregationResult {
    return {
      finalizedText: this.buildSentence(this.finals),
      pendingText: this.buildSentence(this.pending),
    };
  }

  private buildSentence(texts: Map<number, string>): string {
    return Array.from(texts.entries())
      .sort(([a], [b]) => a - b)
      .map(([, text]) => text)
      .join(' ');
  }
}
