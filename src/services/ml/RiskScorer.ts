import { promises as fs } from 'fs';
import { ClassifierArtifact } from './ClassifierArtifact';
import { FeatureVector, ModelInfo, ModelScore } from '../../types/models';
import {
  ModelIncompatibleError,
  ModelUnavailableError,
  Result,
  err,
  ok
} from '../../types/errors';

/**
 * Where the serialized classifier comes from
 */
export interface ArtifactSource {
  readonly location: string;
  read(): Promise<unknown>;
}

export class FileArtifactSource implements ArtifactSource {
  constructor(public readonly location: string) {}

  async read(): Promise<unknown> {
    const text = await fs.readFile(this.location, 'utf8');
    const decoded: unknown = JSON.parse(text);
    return decoded;
  }
}

type LoadResult = Result<ClassifierArtifact, ModelUnavailableError>;

/**
 * Scores feature vectors against a single lazily loaded classifier artifact.
 *
 * The artifact is read at most once per successful load: callers arriving while
 * a load is in flight share its outcome. A failed load is not cached, so the
 * next call tries again.
 */
export class RiskScorer {
  private artifact: ClassifierArtifact | null = null;
  private loading: Promise<LoadResult> | null = null;
  private loadedAt?: Date;
  private lastError?: string;

  constructor(private readonly source: ArtifactSource) {}

  load(): Promise<LoadResult> {
    if (this.artifact) {
      return Promise.resolve(ok(this.artifact));
    }

    if (!this.loading) {
      this.loading = this.readArtifact().then(result => {
        if (result.ok) {
          this.artifact = result.value;
          this.loadedAt = new Date();
          this.lastError = undefined;
        } else {
          this.lastError = result.error.message;
        }
        this.loading = null;
        return result;
      });
    }

    return this.loading;
  }

  async score(vector: FeatureVector): Promise<Result<ModelScore, ModelUnavailableError | ModelIncompatibleError>> {
    const loaded = await this.load();
    if (!loaded.ok) {
      return loaded;
    }

    const artifact = loaded.value;
    if (vector.values.length !== artifact.featureCount) {
      return err(new ModelIncompatibleError(artifact.featureCount, vector.values.length));
    }

    const [negative, positive] = artifact.predictProba(vector.values);
    return ok({
      probability: positive,
      confidence: Math.max(negative, positive)
    });
  }

  isLoaded(): boolean {
    return this.artifact !== null;
  }

  getModelInfo(): ModelInfo {
    if (!this.artifact) {
      return {
        path: this.source.location,
        isLoaded: false,
        error: this.lastError
      };
    }

    return {
      path: this.source.location,
      isLoaded: true,
      modelType: this.artifact.modelType,
      version: this.artifact.version,
      featureCount: this.artifact.featureCount,
      loadedAt: this.loadedAt
    };
  }

  private async readArtifact(): Promise<LoadResult> {
    const location = this.source.location;

    let raw: unknown;
    try {
      raw = await this.source.read();
    } catch (error) {
      console.error(`❌ Failed to read model artifact from ${location}:`, error);
      const reason = error instanceof Error ? error.message : String(error);
      return err(new ModelUnavailableError(`Model artifact could not be read: ${reason}`, location));
    }

    const parsed = ClassifierArtifact.parse(raw);
    if (!parsed.ok) {
      console.error(`❌ Model artifact at ${location} is malformed: ${parsed.error}`);
      return err(new ModelUnavailableError(`Model artifact is malformed: ${parsed.error}`, location));
    }

    const artifact = parsed.value;
    console.log(`✅ Model loaded from ${location} (${artifact.modelType} v${artifact.version}, ${artifact.featureCount} features)`);
    return ok(artifact);
  }
}
