import { describe, expect, it } from 'vitest';

import NameIndex from '../name-index';

describe('NameIndex', () => {
  it('looks names up regardless of case and surrounding spaces', () => {
    const index = new NameIndex<number>().set('Front Door', 1);

    expect(index.get('front door')).toBe(1);
    expect(index.get('  FRONT DOOR ')).toBe(1);
    expect(index.has('Back Door')).toBe(false);
  });

  it('keeps the first display name when a value is replaced', () => {
    const index = new NameIndex<number>().set('Front Door', 1).set('FRONT DOOR', 2);

    expect(index.size).toBe(1);
    expect(index.entries()).toEqual([['Front Door', 2]]);
  });

  it('deletes by any spelling of the name', () => {
    const index = new NameIndex<string>().set('Garage', 'a').set('Porch', 'b');

    expect(index.delete('garage')).toBe(true);
    expect(index.names()).toEqual(['Porch']);
    expect(index.values()).toEqual(['b']);
  });
});
