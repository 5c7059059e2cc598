import { Database } from 'sqlite';
import { EvaluationRepository } from '../../repositories/EvaluationRepository';
import { EvaluationDraft, Sex } from '../../types/models';
import { PersistenceError } from '../../types/errors';
import { alternatingResponses, openMigratedDatabase } from '../helpers';

describe('EvaluationRepository', () => {
  let db: Database;
  let repository: EvaluationRepository;

  const draft = (probability: number, sex: Sex = 'M'): EvaluationDraft => ({
    age: 6,
    sex,
    responses: alternatingResponses(),
    consent: true,
    probability
  });

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    db = await openMigratedDatabase();
    repository = new EvaluationRepository(db);
  });

  afterEach(async () => {
    await db.close();
    jest.restoreAllMocks();
  });

  describe('append', () => {
    it('should assign increasing ids', async () => {
      const first = await repository.append(draft(0.1));
      const second = await repository.append(draft(0.2));

      expect(first.id).toBe(1);
      expect(second.id).toBe(2);
      expect(first.createdAt).toBeInstanceOf(Date);
    });

    it('should return what it stored', async () => {
      const record = await repository.append(draft(0.42, 'F'));
      const stored = await repository.getById(record.id);

      expect(stored).toEqual(record);
      expect(stored?.responses).toEqual(alternatingResponses());
    });

    it('should wrap database failures in a PersistenceError', async () => {
      jest.spyOn(console, 'error').mockImplementation(() => undefined);

      const failing = repository.append({ ...draft(0.5), age: 0 });

      await expect(failing).rejects.toBeInstanceOf(PersistenceError);
      await expect(failing).rejects.toThrow('Failed to store evaluation');
      expect(await repository.count()).toBe(0);
    });

    it('should keep every record from concurrent appends', async () => {
      const records = await Promise.all(
        Array.from({ length: 10 }, (_, i) => repository.append(draft(i / 10)))
      );

      expect(new Set(records.map(r => r.id)).size).toBe(10);
      expect(await repository.count()).toBe(10);
    });
  });

  describe('getById', () => {
    it('should return null for an unknown id', async () => {
      expect(await repository.getById(99)).toBeNull();
    });
  });

  describe('list', () => {
    it('should list newest first without responses', async () => {
      await repository.append(draft(0.1));
      await repository.append(draft(0.2));
      await repository.append(draft(0.3));

      const page = await repository.list(10, 0);

      expect(page.map(e => e.id)).toEqual([3, 2, 1]);
      expect('responses' in page[0]).toBe(false);
      expect(page[0]).toMatchObject({ age: 6, sex: 'M', consent: true, probability: 0.3 });
    });

    it('should page with limit and offset', async () => {
      for (let i = 0; i < 5; i++) {
        await repository.append(draft(0.1));
      }

      expect((await repository.list(2, 1)).map(e => e.id)).toEqual([4, 3]);
      expect(await repository.list(10, 5)).toEqual([]);
      expect(await repository.list(0, 0)).toEqual([]);
    });

    it('should reject negative or fractional paging values', async () => {
      await expect(repository.list(-1, 0)).rejects.toBeInstanceOf(RangeError);
      await expect(repository.list(10, -1)).rejects.toBeInstanceOf(RangeError);
      await expect(repository.list(1.5, 0)).rejects.toBeInstanceOf(RangeError);
    });
  });

  describe('aggregate', () => {
    it('should return zeros for an empty store', async () => {
      expect(await repository.aggregate()).toEqual({
        totalEvaluations: 0,
        riskDistribution: { low: 0, medium: 0, high: 0 },
        sexDistribution: { male: 0, female: 0 }
      });
    });

    it('should count risk levels with thresholds in the upper level', async () => {
      await repository.append(draft(0.1, 'M'));
      await repository.append(draft(0.3, 'F'));
      await repository.append(draft(0.69, 'M'));
      await repository.append(draft(0.7, 'F'));

      expect(await repository.aggregate()).toEqual({
        totalEvaluations: 4,
        riskDistribution: { low: 1, medium: 2, high: 1 },
        sexDistribution: { male: 2, female: 2 }
      });
    });
  });
});
