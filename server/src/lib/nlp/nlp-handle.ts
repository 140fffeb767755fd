import nlp from 'compromise';

/**
 * Thin wrapper over compromise, created once at startup and shared by
 * every pipeline stage that needs sentence-level parsing.
 */
export class NlpHandle {
  /**
   * Split text into sentences. Line breaks always end a sentence so that
   * greetings and sign-offs never merge into body sentences.
   */
  splitSentences(text: string): string[] {
    const sentences: string[] = [];

    for (const line of text.split(/\r?\n+/)) {
      const trimmed = line.trim();
      if (!trimmed) {
        continue;
      }

      const parsed: unknown = nlp(trimmed).sentences().out('array');
      const parts = Array.isArray(parsed)
        ? parsed.filter((part): part is string => typeof part === 'string')
        : [trimmed];

      for (const part of parts) {
        const sentence = part.trim();
        if (sentence) {
          sentences.push(sentence);
        }
      }
    }

    return sentences;
  }

  /**
   * compromise match syntax, e.g. '(problem|issue|not working)'
   */
  matches(text: string, pattern: string): boolean {
    if (!text.trim()) {
      return false;
    }
    return nlp(text).match(pattern).found;
  }

  /**
   * True when the sentence describes something already done
   * ("I sent the file yesterday"), judged by its leading verb.
   */
  leadsWithPastTense(sentence: string): boolean {
    return nlp(sentence).verbs().first().has('#PastTense');
  }

  wordCount(text: string): number {
    return text.split(/\s+/).filter(word => /[A-Za-z0-9]/.test(word)).length;
  }
}

export function createNlpHandle(): NlpHandle {
  // Warm the lexicon so the first request does not pay for it
  nlp('warm up').sentences();
  return new NlpHandle();
}
