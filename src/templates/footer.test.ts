import { describe, expect, it } from 'vitest';
import { addFooter } from './footer';

describe('footer', () => {
  it('appends the footer below a separator', () => {
    expect(addFooter('Hello', 'Made with the relay')).toBe('Hello\n\n—\nMade with the relay');
  });
});
