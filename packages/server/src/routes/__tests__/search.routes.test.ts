import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import type { User } from '@magic-chef/shared';
import {
  loginAs,
  setupTestApp,
  teardownTestApp,
  type TestAgent,
  type TestContext,
} from '../../test/test-app.js';
import { recipeInput } from '../../test/fixtures.js';

describe('Search Routes', () => {
  let ctx: TestContext;
  let agent: TestAgent;
  let user: User;

  beforeEach(async () => {
    ctx = setupTestApp();
    ({ agent, user } = await loginAs(ctx, 'alice'));
  });

  afterEach(() => {
    teardownTestApp(ctx);
  });

  it('should render matching recipes as a fragment', async () => {
    ctx.services.recipes.create(user.id, recipeInput());
    ctx.services.recipes.create(user.id, recipeInput({ title: 'Carrot Cake', summary: 'Moist', tags: ['cake'] }));

    const response = await agent.get('/search/results?q=soup').set('HX-Request', 'true');

    expect(response.status).toBe(200);
    expect(response.text).toContain('1 recipe for soup');
    expect(response.text).toContain('Tomato Soup');
    expect(response.text).not.toContain('Carrot Cake');
  });

  it('should hint when nothing was typed', async () => {
    const response = await agent.get('/search/results?q=').set('HX-Request', 'true');

    expect(response.text).toBe('<p class="search-hint">Type to search recipes.</p>');
  });

  it('should say when nothing matched', async () => {
    const response = await agent.get('/search/results?q=lasagne').set('HX-Request', 'true');

    expect(response.text).toBe('<p class="search-empty">No recipes found for lasagne.</p>');
  });

  it('should return results as JSON', async () => {
    const recipe = ctx.services.recipes.create(user.id, recipeInput());

    const response = await agent.get('/search/results?tag=soup').set('Accept', 'application/json');

    expect(response.status).toBe(200);
    expect(response.body.data.map((r: { id: number }) => r.id)).toEqual([recipe.id]);
  });

  it('should show visitors public recipes only', async () => {
    ctx.services.recipes.create(user.id, recipeInput({ title: 'Secret Soup' }));
    const shared = ctx.services.recipes.create(user.id, recipeInput({ title: 'Shared Soup', is_public: true }));

    const response = await request(ctx.app).get('/search/results?q=soup').set('Accept', 'application/json');

    expect(response.body.data.map((r: { id: number }) => r.id)).toEqual([shared.id]);
  });

  it('should render the full search page', async () => {
    ctx.services.recipes.create(user.id, recipeInput());

    const response = await agent.get('/search?ingredient=garlic');

    expect(response.status).toBe(200);
    expect(response.text.startsWith('<!DOCTYPE html>')).toBe(true);
    expect(response.text).toContain('Tomato Soup');
  });

  it('should list the visible tags', async () => {
    ctx.services.recipes.create(user.id, recipeInput({ tags: ['soup', 'quick'] }));

    const response = await agent.get('/search/tags').set('Accept', 'application/json');

    expect(response.body.data).toEqual(['quick', 'soup']);
  });
});
