import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Database } from 'better-sqlite3';
import type { User } from '@magic-chef/shared';
import { createTestDatabase } from '../../db/index.js';
import { createServices, type Services } from '../index.js';
import { createFakeProviders, type FakeProviders } from '../../test/fakes.js';
import { recipeInput, TINY_PNG } from '../../test/fixtures.js';
import { ConflictError, ForbiddenError, NotFoundError } from '../../types/errors.js';

describe('RecipeService', () => {
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

  describe('get', () => {
    it('should let owners read private recipes', () => {
      const recipe = services.recipes.create(alice.id, recipeInput());

      expect(services.recipes.get(alice.id, recipe.id).title).toBe('Tomato Soup');
    });

    it('should hide private recipes from other users and visitors', () => {
      const recipe = services.recipes.create(alice.id, recipeInput());

      expect(() => services.recipes.get(bob.id, recipe.id)).toThrow(ForbiddenError);
      expect(() => services.recipes.get(null, recipe.id)).toThrow(ForbiddenError);
    });

    it('should show public recipes to everyone', () => {
      const recipe = services.recipes.create(alice.id, recipeInput({ is_public: true }));

      expect(services.recipes.get(null, recipe.id).id).toBe(recipe.id);
    });

    it('should throw NotFoundError for unknown ids', () => {
      expect(() => services.recipes.get(alice.id, 999)).toThrow(NotFoundError);
    });
  });

  describe('update', () => {
    it('should refuse to change public recipes of other users', () => {
      const recipe = services.recipes.create(alice.id, recipeInput({ is_public: true }));

      expect(() => services.recipes.update(bob.id, recipe.id, { title: 'Mine now' })).toThrow(
        'You can only change your own recipes'
      );
      expect(services.recipes.get(alice.id, recipe.id).title).toBe('Tomato Soup');
    });
  });

  describe('createWithUpload', () => {
    it('should write the recipe and its image together', async () => {
      const recipe = await services.recipes.createWithUpload(alice.id, recipeInput(), {
        data: TINY_PNG,
        contentType: 'image/png',
        altText: 'Soup bowl',
      });

      expect(recipe.images).toHaveLength(1);
      expect(recipe.images[0]?.alt_text).toBe('Soup bowl');
      expect(providers.storage.files.has(recipe.images[0]?.storage_key ?? '')).toBe(true);
    });

    it('should remove the stored file when the recipe cannot be written', async () => {
      await expect(
        services.recipes.createWithUpload(alice.id, recipeInput({ title: ' ' }), {
          data: TINY_PNG,
          contentType: 'image/png',
        })
      ).rejects.toThrow();

      expect(providers.storage.files.size).toBe(0);
      expect(services.recipes.listForUser(alice.id)).toEqual([]);
    });
  });

  describe('updateWithUpload', () => {
    it('should not store a file for recipes of other users', async () => {
      const recipe = services.recipes.create(alice.id, recipeInput({ is_public: true }));

      await expect(
        services.recipes.updateWithUpload(bob.id, recipe.id, { title: 'Mine' }, {
          data: TINY_PNG,
          contentType: 'image/png',
        })
      ).rejects.toThrow(ForbiddenError);

      expect(providers.storage.files.size).toBe(0);
    });
  });

  describe('delete', () => {
    it('should remove the stored image files', async () => {
      const recipe = services.recipes.create(alice.id, recipeInput());
      const image = await services.images.upload(alice.id, recipe.id, {
        data: TINY_PNG,
        contentType: 'image/png',
      });
      expect(providers.storage.files.has(image.storage_key)).toBe(true);

      await services.recipes.delete(alice.id, recipe.id);

      expect(providers.storage.files.size).toBe(0);
      expect(services.repositories.images.findById(image.id)).toBeNull();
    });

    it('should still delete the recipe when storage fails', async () => {
      const recipe = services.recipes.create(alice.id, recipeInput());
      await services.images.upload(alice.id, recipe.id, { data: TINY_PNG, contentType: 'image/png' });
      providers.storage.failDeletes = true;

      await services.recipes.delete(alice.id, recipe.id);

      expect(services.repositories.recipes.findById(recipe.id)).toBeNull();
    });

    it('should reject deleting recipes of other users', async () => {
      const recipe = services.recipes.create(alice.id, recipeInput({ is_public: true }));

      await expect(services.recipes.delete(bob.id, recipe.id)).rejects.toThrow(ForbiddenError);
    });
  });

  describe('copy', () => {
    it('should save a private copy without images', async () => {
      const source = services.recipes.create(alice.id, recipeInput({ is_public: true }));
      await services.images.upload(alice.id, source.id, { data: TINY_PNG, contentType: 'image/png' });

      const copy = services.recipes.copy(bob.id, source.id);

      expect(copy).toMatchObject({
        user_id: bob.id,
        title: 'Tomato Soup',
        is_public: false,
        original_id: source.id,
        tags: ['soup'],
        images: [],
      });
      expect(copy.steps.map((step) => step.instruction)).toEqual(
        source.steps.map((step) => step.instruction)
      );
    });

    it('should point copies of copies at the original', () => {
      const source = services.recipes.create(alice.id, recipeInput({ is_public: true }));
      const first = services.recipes.copy(bob.id, source.id);
      services.recipes.update(bob.id, first.id, { is_public: true });
      const carol = services.repositories.users.create({
        username: 'carol',
        email: 'carol@example.com',
        password_hash: 'x',
      });

      expect(services.recipes.copy(carol.id, first.id).original_id).toBe(source.id);
    });

    it('should refuse a second copy of the same recipe', () => {
      const source = services.recipes.create(alice.id, recipeInput({ is_public: true }));
      services.recipes.copy(bob.id, source.id);

      expect(() => services.recipes.copy(bob.id, source.id)).toThrow(ConflictError);
    });

    it('should refuse copying an own recipe', () => {
      const source = services.recipes.create(alice.id, recipeInput({ is_public: true }));

      expect(() => services.recipes.copy(alice.id, source.id)).toThrow(
        'This recipe is already in your collection'
      );
    });

    it('should refuse copying a private recipe', () => {
      const source = services.recipes.create(alice.id, recipeInput());

      expect(() => services.recipes.copy(bob.id, source.id)).toThrow(ForbiddenError);
    });
  });

  describe('bulk actions', () => {
    it('should delete only recipes the user owns', async () => {
      const mine = services.recipes.create(alice.id, recipeInput());
      const theirs = services.recipes.create(bob.id, recipeInput());

      expect(await services.recipes.bulkDelete(alice.id, [mine.id, theirs.id])).toBe(1);
      expect(services.repositories.recipes.findById(mine.id)).toBeNull();
      expect(services.repositories.recipes.findById(theirs.id)).not.toBeNull();
    });

    it('should tag only recipes the user owns', () => {
      const mine = services.recipes.create(alice.id, recipeInput());
      const theirs = services.recipes.create(bob.id, recipeInput());

      expect(services.recipes.bulkTag(alice.id, [mine.id, theirs.id], 'favourite')).toBe(1);
      expect(services.recipes.get(alice.id, mine.id).tags).toEqual(['favourite', 'soup']);
      expect(services.recipes.get(bob.id, theirs.id).tags).toEqual(['soup']);
    });

    it('should export all own recipes oldest first', () => {
      const first = services.recipes.create(alice.id, recipeInput({ title: 'First' }));
      const second = services.recipes.create(alice.id, recipeInput({ title: 'Second' }));
      services.recipes.create(bob.id, recipeInput());

      expect(services.recipes.listForExport(alice.id).map((recipe) => recipe.id)).toEqual([first.id, second.id]);
    });

    it('should export only listed recipes the user owns', () => {
      const mine = services.recipes.create(alice.id, recipeInput());
      services.recipes.create(alice.id, recipeInput());
      const theirs = services.recipes.create(bob.id, recipeInput());

      const exported = services.recipes.listForExport(alice.id, [theirs.id, mine.id]);

      expect(exported.map((recipe) => recipe.id)).toEqual([mine.id]);
      expect(exported[0]?.ingredients).toHaveLength(2);
    });
  });
});
