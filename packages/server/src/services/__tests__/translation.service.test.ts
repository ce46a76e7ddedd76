import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Database } from 'better-sqlite3';
import type { User } from '@magic-chef/shared';
import { createTestDatabase } from '../../db/index.js';
import { createServices, type Services } from '../index.js';
import { createFakeProviders, type FakeProviders } from '../../test/fakes.js';
import { recipeInput } from '../../test/fixtures.js';
import { ForbiddenError, ProviderError, ValidationError } from '../../types/errors.js';

describe('TranslationService', () => {
  let db: Database;
  let providers: FakeProviders;
  let services: Services;
  let alice: User;
  let bob: User;

  beforeEach(() => {
    db = createTestDatabase();
    providers = createFakeProviders();
    services = createServices(db, providers);
    alice = services.repositories.users.create({
      username: 'alice',
      email: 'alice@example.com',
      password_hash: 'x',
    });
    bob = services.repositories.users.create({
      username: 'bob',
      email: 'bob@example.com',
      password_hash: 'x',
    });
  });

  afterEach(() => {
    db.close();
  });

  it('should save recipe 42 in German as a new recipe and leave the original alone', async () => {
    db.prepare("INSERT INTO sqlite_sequence (name, seq) VALUES ('recipes', 41)").run();
    const source = services.recipes.create(alice.id, recipeInput());
    expect(source.id).toBe(42);

    const translated = await services.translation.translate(alice.id, 42, 'de');

    expect(translated.id).not.toBe(42);
    expect(translated).toMatchObject({
      user_id: alice.id,
      title: '[de] Tomato Soup',
      summary: '[de] A quick weeknight soup',
      language: 'de',
      servings: 4,
      total_time_minutes: 30,
      notes: ['[de] Serve with bread'],
      is_public: false,
      original_id: 42,
      tags: ['soup'],
    });
    expect(translated.ingredients).toEqual([
      { name: '[de] tomatoes', quantity: '[de] 800 g' },
      { name: '[de] garlic', quantity: '[de] 2 cloves' },
    ]);
    expect(translated.steps.map((step) => step.instruction)).toEqual([
      '[de] Chop the tomatoes',
      '[de] Simmer for 20 minutes',
      '[de] Blend until smooth',
    ]);

    const original = services.recipes.get(alice.id, 42);
    expect(original).toEqual(source);
  });

  it('should send every non-empty text in one batch', async () => {
    const source = services.recipes.create(
      alice.id,
      recipeInput({ summary: '', ingredients: [{ name: 'salt', quantity: '' }] })
    );

    const translated = await services.translation.translate(alice.id, source.id, 'fr');

    expect(providers.translation.calls).toEqual([
      {
        texts: [
          'Tomato Soup',
          'Serve with bread',
          'salt',
          'Chop the tomatoes',
          'Simmer for 20 minutes',
          'Blend until smooth',
        ],
        target: 'fr',
        source: 'en',
      },
    ]);
    expect(translated.summary).toBe('');
    expect(translated.ingredients).toEqual([{ name: '[fr] salt', quantity: '' }]);
  });

  it('should translate public recipes of other users into the caller collection', async () => {
    const source = services.recipes.create(alice.id, recipeInput({ is_public: true }));

    const translated = await services.translation.translate(bob.id, source.id, 'es');

    expect(translated.user_id).toBe(bob.id);
  });

  it('should refuse private recipes of other users', async () => {
    const source = services.recipes.create(alice.id, recipeInput());

    await expect(services.translation.translate(bob.id, source.id, 'de')).rejects.toThrow(ForbiddenError);
    expect(providers.translation.calls).toHaveLength(0);
  });

  it('should refuse translating into the recipe language', async () => {
    const source = services.recipes.create(alice.id, recipeInput());

    await expect(services.translation.translate(alice.id, source.id, 'en')).rejects.toThrow(
      new ValidationError('Recipe is already in English')
    );
  });

  it('should save nothing when translations go missing', async () => {
    const source = services.recipes.create(alice.id, recipeInput());
    providers.translation.dropLast = true;

    await expect(services.translation.translate(alice.id, source.id, 'de')).rejects.toThrow(
      'fake-translate: Expected 10 translations, got 9'
    );
    expect(services.recipes.listForUser(alice.id)).toHaveLength(1);
  });

  it('should wrap translator failures in a ProviderError', async () => {
    const source = services.recipes.create(alice.id, recipeInput());
    providers.translation.failure = new Error('quota exceeded');

    await expect(services.translation.translate(alice.id, source.id, 'de')).rejects.toThrow(
      new ProviderError('fake-translate', 'quota exceeded')
    );
  });
});
