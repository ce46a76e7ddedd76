import { describe, it, expect } from 'vitest';
import { safeRedirectTarget } from '../helpers.js';

describe('safeRedirectTarget', () => {
  it('should keep local paths with their query', () => {
    expect(safeRedirectTarget('/recipes/3?tab=steps')).toBe('/recipes/3?tab=steps');
  });

  it('should fall back for targets on other sites', () => {
    expect(safeRedirectTarget('//evil.example.com')).toBe('/');
    expect(safeRedirectTarget('/\\evil.example.com')).toBe('/');
    expect(safeRedirectTarget('https://evil.example.com/')).toBe('/');
  });

  it('should fall back for control characters and non-strings', () => {
    expect(safeRedirectTarget('/\t/evil.example.com')).toBe('/');
    expect(safeRedirectTarget(['/table'], '/home')).toBe('/home');
  });
});
