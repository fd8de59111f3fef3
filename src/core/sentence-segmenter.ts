/**
 * SentenceSegmenter — turns streamed reply fragments into complete,
 * speakable sentences.
 *
 * A sentence ends at a run of terminal punctuation (.!?) followed by
 * whitespace. A run at the very end of the buffer is held back until the
 * next fragment arrives, since that fragment may extend it ("..." or "3.5");
 * flush() releases whatever is left once the stream has ended.
 */

const SENTENCE_END = /[.!?]+(?=\s)/;

export class SentenceSegmenter {
  private buffer = '';

  /** Append a fragment and return the sentences it completed, in order. */
  add(fragment: string): string[] {
    if (!fragment) return [];
    this.buffer += fragment;
    return this.extractSentences();
  }

  /** Return the trimmed remainder ('' when nothing is buffered) and clear it. */
  flush(): string {
    const text = this.buffer.trim();
    this.buffer = '';
    return text;
  }

  reset(): void {
    this.buffer = '';
  }

  /** Text received but not yet emitted. */
  get pending(): string {
    return this.buffer;
  }

  private extractSentences(): string[] {
    const sentences: string[] = [];

    let match = SENTENCE_END.exec(this.buffer);
    while (match) {
      const end = match.index + match[0].length;
      const sentence = this.buffer.slice(0, end).trim();
      this.buffer = this.buffer.slice(end).replace(/^\s+/, '');
      if (sentence.length > 0) {
        sentences.push(sentence);
      }
      match = SENTENCE_END.exec(this.buffer);
    }

    return sentences;
  }
}
