// wink-sentiment ships no type declarations
declare module 'wink-sentiment' {
  interface SentimentToken {
    value: string;
    tag: string;
    score?: number;
    negation?: boolean;
  }

  interface SentimentResult {
    score: number;
    normalizedScore: number;
    tokenizedPhrase: SentimentToken[];
  }

  function winkSentiment(phrase: string): SentimentResult;

  export = winkSentiment;
}
