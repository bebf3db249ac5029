// Audio collaborator contracts. Implementations live in the host app.

export interface TextToSpeech {
  /** Plays the cached full-sentence audio and stops output at stopAtMs. */
  playCarrierUntil(sentenceText: string, stopAtMs: number, onDone: () => void): void;
  /** Synthesizes and plays text; a full sentence also warms the audio cache. */
  playFull(text: string, onDone: () => void): void;
  /** Plays the cached full-sentence audio from fromMs to the end. */
  playFrom(sentenceText: string, fromMs: number, onDone: () => void): void;
  /** Stops any output; pending onDone callbacks may or may not fire. */
  stop(): void;
}

export interface AudioCache {
  /**
   * Start of `word` in the cached sentence audio. `occurrenceFromEnd` picks
   * which occurrence, counted from the end of the sentence (1 = last).
   */
  findWordTimestampMs(sentenceText: string, word: string, occurrenceFromEnd?: number): number | undefined;
}

export interface SoundCues {
  playSuccess(): void;
  playFailure(): void;
}
