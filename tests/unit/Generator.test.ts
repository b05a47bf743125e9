import fs from 'fs-extra';
import path from 'path';
import { Generator } from '../../src/core/Generator';
import { CombinationRegistry } from '../../src/core/CombinationRegistry';
import { CollectionConfig } from '../../src/types/config';
import { ErrorType } from '../../src/types/errors';
import { TokenMetadata } from '../../src/types/metadata';
import { BLUE, CLEAR, RED, createTempDir, makeConfig, sequenceRandom, writePng } from '../helpers/fixtures';

describe('Generator', () => {
  let dir: string;
  let assetsDir: string;
  let outputDir: string;

  const config = (overrides: Partial<CollectionConfig> = {}): CollectionConfig => makeConfig({
    layers: [
      { name: 'background', rarities: [40, 30, 30] },
      { name: 'eyes', rarities: [50, 50] }
    ],
    amount: 5,
    assets_dir: assetsDir,
    output_dir: outputDir,
    seed: 11,
    ...overrides
  });

  const listDir = async (subdir: string): Promise<string[]> =>
    (await fs.readdir(path.join(outputDir, subdir))).sort();

  const readToken = async (edition: number): Promise<TokenMetadata> =>
    fs.readJson(path.join(outputDir, 'json', `${edition}.json`));

  beforeAll(async () => {
    dir = await createTempDir('generator');
    assetsDir = path.join(dir, 'assets');
    await writePng(path.join(assetsDir, 'background', 'red.png'), RED);
    await writePng(path.join(assetsDir, 'background', 'blue.png'), BLUE);
    await writePng(path.join(assetsDir, 'background', 'clear.png'), CLEAR);
    await writePng(path.join(assetsDir, 'eyes', 'left.png'), CLEAR);
    await writePng(path.join(assetsDir, 'eyes', 'right.png'), { ...BLUE, alpha: 0.5 });
    await writePng(path.join(assetsDir, 'mouth', 'frown.png'), CLEAR);
    await writePng(path.join(assetsDir, 'mouth', 'smile.png'), CLEAR);
  });

  beforeEach(() => {
    outputDir = path.join(dir, `build-${Date.now()}-${Math.floor(Math.random() * 1e6)}`);
  });

  afterAll(async () => {
    await fs.remove(dir);
  });

  describe('generate', () => {
    it('should write one image and one metadata file per edition starting at 0', async () => {
      const result = await new Generator(config()).generate();

      expect(await listDir('images')).toEqual(['0.png', '1.png', '2.png', '3.png', '4.png']);
      expect(await listDir('json')).toEqual(['0.json', '1.json', '2.json', '3.json', '4.json']);
      expect(result.records.map(record => record.edition)).toEqual([0, 1, 2, 3, 4]);
      expect(result.notices).toEqual([]);

      for (const edition of [0, 1, 2, 3, 4]) {
        const token = await readToken(edition);
        expect(token.edition).toBe(edition);
        expect(token.name).toBe(`Test #${edition}`);
        expect(token.image).toBe(`ipfs://test/baseURI/${edition}.png`);
        expect(token.attributes.map(attribute => attribute.trait_type)).toEqual(['background', 'eyes']);
      }
    });

    it('should never accept the same combination twice', async () => {
      const result = await new Generator(config({ amount: 6 })).generate();
      const keys = result.records.map(record => CombinationRegistry.keyOf(record.combination));

      expect(new Set(keys).size).toBe(6);
      expect(result.records).toHaveLength(6);
    });

    it('should number editions from 1 when configured', async () => {
      const result = await new Generator(config({ id_from_one: true, amount: 3 })).generate();

      expect(result.records.map(record => record.edition)).toEqual([1, 2, 3]);
      expect(await listDir('json')).toEqual(['1.json', '2.json', '3.json']);
      expect((await readToken(3)).edition).toBe(3);
    });

    it('should fail fast when more tokens are requested than combinations exist', async () => {
      await expect(new Generator(config({ amount: 7 })).generate()).rejects.toMatchObject({
        type: ErrorType.COLLECTION_EXHAUSTED,
        message: 'Collection space exhausted: 7 tokens requested but only 6 unique combinations exist'
      });
      expect(await listDir('images')).toEqual([]);
    });

    it('should fall back to unused combinations after too many consecutive duplicate draws', async () => {
      // A constant draw repeats the first combination forever
      const generator = new Generator(config({ amount: 2, max_duplicate_retries: 3 }), {
        random: sequenceRandom([0])
      });

      const result = await generator.generate();

      expect(result.duplicates).toBe(3);
      expect(result.records.map(record => record.metadata.attributes.map(attribute => attribute.value))).toEqual([
        ['blue', 'left'],
        ['blue', 'right']
      ]);
      expect(await listDir('json')).toEqual(['0.json', '1.json']);
    });

    it('should complete a collection whose last combinations are very unlikely', async () => {
      const skewed = config({
        layers: [
          { name: 'eyes', rarities: [99, 1] },
          { name: 'mouth', rarities: [99, 1] }
        ],
        amount: 4,
        seed: 1
      });

      const result = await new Generator(skewed).generate();
      const keys = result.records.map(record => CombinationRegistry.keyOf(record.combination));

      expect(new Set(keys).size).toBe(4);
      expect(await listDir('json')).toEqual(['0.json', '1.json', '2.json', '3.json']);
    });

    it('should walk the unused combinations in order when every draw repeats', async () => {
      const skewed = config({
        layers: [
          { name: 'eyes', rarities: [99, 1] },
          { name: 'mouth', rarities: [99, 1] }
        ],
        amount: 4,
        max_duplicate_retries: 2
      });

      const result = await new Generator(skewed, { random: sequenceRandom([0]) }).generate();

      expect(result.records.map(record => record.metadata.attributes.map(attribute => attribute.value))).toEqual([
        ['left', 'frown'],
        ['left', 'smile'],
        ['right', 'frown'],
        ['right', 'smile']
      ]);
      expect(result.duplicates).toBe(6);
    });

    it('should produce the same collection for the same seed', async () => {
      const first = await new Generator(config({ seed: 'repeatable' })).generate();
      outputDir = `${outputDir}-again`;
      const second = await new Generator(config({ seed: 'repeatable' })).generate();

      expect(second.records.map(record => record.metadata)).toEqual(first.records.map(record => record.metadata));
    });

    it('should add rarity percentages and ranks when enabled', async () => {
      await new Generator(config({ rich_metadata: true, paintswap_metadata: true })).generate();

      const tokens = await Promise.all([0, 1, 2, 3, 4].map(readToken));
      expect(tokens.map(token => token.rank).sort()).toEqual([1, 2, 3, 4, 5]);
      for (const token of tokens) {
        expect(typeof token.rarity_score).toBe('number');
        for (const attribute of token.attributes) {
          expect(typeof attribute.rarity).toBe('number');
        }
      }
      expect(await listDir('stats')).toEqual(['rarity.json']);
    });

    it('should explain instead of failing when ranking is requested without rich metadata', async () => {
      const result = await new Generator(config({ paintswap_metadata: true })).generate();

      expect(result.notices).toEqual([
        'Cannot use paintswap metadata without rich_metadata!\nPlease set it to true in the config file.'
      ]);
      expect(result.records).toHaveLength(5);
      expect((await readToken(0)).rank).toBeUndefined();
    });

    it('should empty the output directory when asked to clean', async () => {
      await fs.outputFile(path.join(outputDir, 'stale.txt'), 'old');

      await new Generator(config({ amount: 1 })).generate({ clean: true });

      expect((await fs.readdir(outputDir)).sort()).toEqual(['images', 'json']);
    });

    it('should honour an amount override', async () => {
      const result = await new Generator(config()).generate({ amountOverride: 2 });

      expect(await listDir('images')).toEqual(['0.png', '1.png']);
      expect(result.records).toHaveLength(2);
    });
  });

  describe('previewTraits', () => {
    it('should draw unique combinations without writing files', async () => {
      const combinations = await new Generator(config()).previewTraits(4);

      expect(new Set(combinations.map(CombinationRegistry.keyOf)).size).toBe(4);
      expect(await fs.pathExists(outputDir)).toBe(false);
    });
  });

  describe('validate', () => {
    it('should report the reachable combination space', async () => {
      const result = await new Generator(config()).validate();

      expect(result.isValid).toBe(true);
      expect(result.stats.combinationSpace).toBe(6);
    });
  });
});
