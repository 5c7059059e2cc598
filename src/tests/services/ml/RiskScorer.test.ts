import path from 'path';
import { FileArtifactSource, RiskScorer } from '../../../services/ml/RiskScorer';
import { FeatureVectorizer } from '../../../services/ml/FeatureVectorizer';
import { ModelIncompatibleError, ModelUnavailableError } from '../../../types/errors';
import { StaticArtifactSource, alternatingResponses, logisticArtifact } from '../../helpers';

const BUNDLED_MODEL = path.join(__dirname, '../../../../data/model.json');

describe('RiskScorer', () => {
  const vectorizer = new FeatureVectorizer();
  const compact = vectorizer.vectorize({ age: 8, sex: 'M', responses: alternatingResponses() });
  const extended = vectorizer.vectorize({ age: 8, sex: 'M', responses: alternatingResponses() }, 'extended');

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should score a compact vector', async () => {
    const scorer = new RiskScorer(StaticArtifactSource.of(logisticArtifact(40, 0.125, -2.5)));

    const result = await scorer.score(compact);

    expect(result).toEqual({ ok: true, value: { probability: 0.5, confidence: 0.5 } });
  });

  it('should report confidence as the larger class probability', async () => {
    const scorer = new RiskScorer(StaticArtifactSource.of(logisticArtifact(40, 0, Math.log(3))));

    const result = await scorer.score(compact);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.probability).toBeCloseTo(0.75, 10);
      expect(result.value.confidence).toBeCloseTo(0.75, 10);
    }
  });

  it('should reject a vector of the wrong width', async () => {
    const scorer = new RiskScorer(StaticArtifactSource.of(logisticArtifact(42, 0.125, -2.5)));

    const result = await scorer.score(compact);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ModelIncompatibleError);
      expect(result.error.message).toBe('Model expects 42 features, received 40');
    }
    expect((await scorer.score(extended)).ok).toBe(true);
  });

  it('should read the artifact once for concurrent callers', async () => {
    const source = StaticArtifactSource.of(logisticArtifact(40, 0.125, -2.5));
    const scorer = new RiskScorer(source);

    const results = await Promise.all([scorer.score(compact), scorer.score(compact), scorer.load()]);

    expect(results.every(result => result.ok)).toBe(true);
    expect(source.reads).toBe(1);

    await scorer.score(compact);
    expect(source.reads).toBe(1);
  });

  it('should report an unreadable artifact as unavailable and retry on the next call', async () => {
    let attempts = 0;
    const source = new StaticArtifactSource(async () => {
      attempts++;
      if (attempts === 1) {
        throw new Error('disk offline');
      }
      return logisticArtifact(40, 0.125, -2.5);
    });
    const scorer = new RiskScorer(source);

    const first = await scorer.score(compact);
    expect(first.ok).toBe(false);
    if (!first.ok) {
      expect(first.error).toBeInstanceOf(ModelUnavailableError);
      expect(first.error.message).toBe('Model artifact could not be read: disk offline');
    }
    expect(scorer.getModelInfo()).toEqual({
      path: 'memory://test-model',
      isLoaded: false,
      error: 'Model artifact could not be read: disk offline'
    });

    const second = await scorer.score(compact);
    expect(second.ok).toBe(true);
    expect(source.reads).toBe(2);
  });

  it('should report a malformed artifact as unavailable', async () => {
    const scorer = new RiskScorer(StaticArtifactSource.of({ format: 'ndd-risk-classifier' }));

    const result = await scorer.load();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('ModelUnavailable');
      expect(result.error.message).toMatch(/^Model artifact is malformed: /);
    }
    expect(scorer.isLoaded()).toBe(false);
  });

  it('should describe the loaded model', async () => {
    const scorer = new RiskScorer(StaticArtifactSource.of(logisticArtifact(40, 0.125, -2.5)));

    expect(scorer.getModelInfo()).toEqual({ path: 'memory://test-model', isLoaded: false, error: undefined });

    await scorer.load();
    const info = scorer.getModelInfo();

    expect(scorer.isLoaded()).toBe(true);
    expect(info).toMatchObject({
      path: 'memory://test-model',
      isLoaded: true,
      modelType: 'logistic_regression',
      version: 'test',
      featureCount: 40
    });
    expect(info.loadedAt).toBeInstanceOf(Date);
  });

  describe('FileArtifactSource', () => {
    it('should load the bundled model', async () => {
      const scorer = new RiskScorer(new FileArtifactSource(BUNDLED_MODEL));

      const result = await scorer.score(compact);

      // intercept -3.4 plus the even-position weights (4.2)
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.probability).toBeCloseTo(1 / (1 + Math.exp(-0.8)), 10);
      }
      expect(scorer.getModelInfo().featureCount).toBe(40);
    });

    it('should report a missing file as unavailable', async () => {
      const scorer = new RiskScorer(new FileArtifactSource(path.join(__dirname, 'missing-model.json')));

      const result = await scorer.load();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ModelUnavailableError);
        expect(result.error.modelPath).toBe(path.join(__dirname, 'missing-model.json'));
      }
    });
  });
});
