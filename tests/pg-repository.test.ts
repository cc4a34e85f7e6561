import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConcurrentUpdateError, NotFoundError } from '../server/errors.js';
import { applyReview } from '../server/srs/index.js';
import { PgGrammarRepository } from '../server/storage/pg-repository.js';
import { BASE_TIME, buildItem, buildNewItem } from './helpers/grammar-fixtures.js';
import { setupTestDatabase, type TestDatabaseContext } from './helpers/pg.js';

const HOUR = 60 * 60 * 1000;

function later(hours: number): Date {
  return new Date(BASE_TIME.getTime() + hours * HOUR);
}

describe('PgGrammarRepository', () => {
  let context: TestDatabaseContext;
  let repository: PgGrammarRepository;

  beforeEach(async () => {
    context = await setupTestDatabase();
    repository = new PgGrammarRepository(context.db);
  });

  afterEach(async () => {
    await context.cleanup();
  });

  it('stores and reads back a grammar item', async () => {
    const [inserted] = await repository.insertMany([buildNewItem()]);

    expect(inserted).toEqual(buildItem());
    expect(await repository.findById('item-1')).toEqual(buildItem());
    expect(await repository.findById('missing')).toBeNull();
  });

  it('lists due items oldest first and skips unreleased or burned items', async () => {
    await repository.insertMany([
      buildNewItem({ id: 'late', dueAt: later(2), createdAt: later(-3) }),
      buildNewItem({ id: 'early', dueAt: later(1), createdAt: later(-2) }),
      buildNewItem({ id: 'future', dueAt: later(10), createdAt: later(-1) }),
      buildNewItem({ id: 'locked', lessonStatus: 'not_started', dueAt: later(1), createdAt: later(-1) }),
      buildNewItem({ id: 'burned', stage: 'Burned', dueAt: null, createdAt: later(-1) }),
    ]);

    const due = await repository.listDue(later(3));

    expect(due.map((item) => item.id)).toEqual(['early', 'late']);
  });

  it('saves review progress and bumps the version', async () => {
    const [item] = await repository.insertMany([buildNewItem()]);
    const reviewed = applyReview(item, true, later(1));

    const saved = await repository.saveProgress(reviewed, item.version);

    expect(saved).toMatchObject({
      stage: 'Apprentice II',
      lessonStatus: 'in_progress',
      dueAt: later(5),
      correctCount: 1,
      incorrectCount: 0,
      lastReviewedAt: later(1),
      version: 2,
    });
    expect((await repository.findById(item.id))?.stage).toBe('Apprentice II');
  });

  it('refuses to save over a newer version', async () => {
    const [item] = await repository.insertMany([buildNewItem()]);
    await repository.saveProgress(applyReview(item, true, later(1)), 1);

    await expect(repository.saveProgress(applyReview(item, false, later(1)), 1)).rejects.toBeInstanceOf(
      ConcurrentUpdateError,
    );
    expect((await repository.findById(item.id))?.stage).toBe('Apprentice II');
  });

  it('reports a missing item when saving', async () => {
    await expect(repository.saveProgress(buildItem({ id: 'ghost' }), 1)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('releases lessons in creation order up to the limit', async () => {
    await repository.insertMany([
      buildNewItem({ id: 'second', lessonStatus: 'not_started', dueAt: null, createdAt: later(1) }),
      buildNewItem({ id: 'first', lessonStatus: 'not_started', dueAt: null, createdAt: later(0) }),
      buildNewItem({ id: 'third', lessonStatus: 'not_started', dueAt: null, createdAt: later(2) }),
    ]);

    const released = await repository.releaseLessons(2, later(3));

    expect(released.map((item) => [item.id, item.lessonStatus, item.dueAt, item.version])).toEqual([
      ['first', 'available', later(3), 2],
      ['second', 'available', later(3), 2],
    ]);
    expect((await repository.listByLessonStatus('not_started')).map((item) => item.id)).toEqual(['third']);
  });

  it('makes every reviewable item due now', async () => {
    await repository.insertMany([
      buildNewItem({ id: 'a', dueAt: later(48) }),
      buildNewItem({ id: 'b', lessonStatus: 'not_started', dueAt: null }),
      buildNewItem({ id: 'c', stage: 'Burned', dueAt: null }),
    ]);

    expect(await repository.makeAllDue(later(1))).toBe(1);
    expect((await repository.findById('a'))?.dueAt).toEqual(later(1));
    expect((await repository.findById('b'))?.dueAt).toBeNull();
  });

  it('resets all progress back to unreleased lessons', async () => {
    const [item] = await repository.insertMany([buildNewItem({ stage: 'Guru I' })]);
    await repository.saveProgress(applyReview(item, true, later(1)), 1);

    expect(await repository.resetAllProgress(later(2))).toBe(1);
    expect(await repository.findById(item.id)).toMatchObject({
      stage: 'Apprentice I',
      lessonStatus: 'not_started',
      dueAt: null,
      correctCount: 0,
      incorrectCount: 0,
      lastReviewedAt: null,
      updatedAt: later(2),
      version: 3,
    });
  });

  it('upserts settings', async () => {
    expect(await repository.getSetting('daily_lesson_limit')).toBeNull();

    await repository.setSetting('daily_lesson_limit', '10');
    await repository.setSetting('daily_lesson_limit', '20');

    expect(await repository.getSetting('daily_lesson_limit')).toBe('20');
  });
});
