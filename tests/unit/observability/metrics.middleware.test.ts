import { normalizePath } from '../../../src/observability';

describe('normalizePath', () => {
  it('should replace record IDs with a placeholder', () => {
    expect(normalizePath('/orders/ord_0a1b2c3d/cancel')).toBe('/orders/:id/cancel');
    expect(normalizePath('/campaigns/posts/pst_9f8e7d')).toBe('/campaigns/posts/:id');
  });

  it('should replace campaign IDs', () => {
    expect(normalizePath('/campaigns/CAM-2026-03-AB12/posts')).toBe('/campaigns/:id/posts');
  });

  it('should replace numeric segments', () => {
    expect(normalizePath('/admin/audit/42')).toBe('/admin/audit/:id');
  });

  it('should leave static paths alone', () => {
    expect(normalizePath('/orders/quote')).toBe('/orders/quote');
  });
});
