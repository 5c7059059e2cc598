import { FeatureLayout, FeatureVector, Submission } from '../../types/models';

/**
 * Converts a validated submission into the numeric layout the classifier consumes.
 * Compact is the response flags alone; extended appends age and a male flag.
 */
export class FeatureVectorizer {
  vectorize(submission: Submission, layout: FeatureLayout = 'compact'): FeatureVector {
    const flags = submission.responses.map(answer => (answer ? 1.0 : 0.0));

    if (layout === 'compact') {
      return { layout: 'compact', values: flags };
    }

    return {
      layout: 'extended',
      values: [...flags, submission.age, submission.sex === 'M' ? 1.0 : 0.0]
    };
  }
}
