declare module "vader-sentiment" {
  namespace vader {
    interface SentimentScores {
      compound: number;
      pos: number;
      neu: number;
      neg: number;
    }

    class SentimentIntensityAnalyzer {
      static polarity_scores(text: string): SentimentScores;
    }
  }

  export = vader;
}
