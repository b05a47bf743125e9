import { CombinationRegistry } from '../../src/core/CombinationRegistry';
import { Trait, noTrait } from '../../src/types/traits';

const trait = (type: string, name: string): Trait => ({
  kind: 'trait',
  type,
  name,
  path: `/assets/${type}/${name}.png`
});

describe('CombinationRegistry', () => {
  let registry: CombinationRegistry;

  beforeEach(() => {
    registry = new CombinationRegistry();
  });

  it('should start empty', () => {
    expect(registry.size).toBe(0);
    expect(registry.has([trait('background', 'red')])).toBe(false);
  });

  it('should treat structurally equal combinations as the same', () => {
    expect(registry.add([trait('background', 'red'), noTrait('hats')])).toBe(true);

    expect(registry.has([trait('background', 'red'), noTrait('hats')])).toBe(true);
    expect(registry.add([trait('background', 'red'), noTrait('hats')])).toBe(false);
    expect(registry.size).toBe(1);
  });

  it('should distinguish combinations that differ in one layer', () => {
    registry.add([trait('background', 'red'), trait('hats', 'cap')]);

    expect(registry.has([trait('background', 'red'), noTrait('hats')])).toBe(false);
    expect(registry.has([trait('background', 'blue'), trait('hats', 'cap')])).toBe(false);
  });

  it('should be sensitive to layer order', () => {
    registry.add([trait('background', 'red'), trait('hats', 'cap')]);

    expect(registry.has([trait('hats', 'cap'), trait('background', 'red')])).toBe(false);
  });

  it('should tell apart files with the same name in different sub-types', () => {
    const round: Trait = { kind: 'trait', type: 'eyes', name: 'one', group: 'round', path: '/assets/eyes/round/one.png' };
    const narrow: Trait = { kind: 'trait', type: 'eyes', name: 'one', group: 'narrow', path: '/assets/eyes/narrow/one.png' };

    registry.add([round]);

    expect(registry.has([narrow])).toBe(false);
  });
});
