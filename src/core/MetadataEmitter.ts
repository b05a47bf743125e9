import fs from 'fs-extra';
import path from 'path';
import { MetadataConfig } from '../types/config';
import { Attribute, TokenMetadata } from '../types/metadata';
import { TraitCombination, isTrait } from '../types/traits';

export class MetadataEmitter {
  private config: MetadataConfig;

  constructor(config: MetadataConfig) {
    this.config = config;
  }

  createMetadata(edition: number, combination: TraitCombination): TokenMetadata {
    const attributes: Attribute[] = combination.filter(isTrait).map(trait => {
      const attribute: Attribute = { trait_type: trait.type, value: trait.name };
      if (trait.group !== undefined) {
        attribute.sub_type = trait.group;
      }
      return attribute;
    });

    return {
      name: `${this.config.token_prefix} #${edition}`,
      description: this.config.description,
      image: `${this.config.uri_prefix}baseURI/${edition}.png`,
      edition,
      attributes
    };
  }

  async write(metadata: TokenMetadata, dir: string): Promise<string> {
    const filePath = MetadataEmitter.pathFor(dir, metadata.edition);
    await fs.ensureDir(dir);
    await fs.writeJson(filePath, metadata, { spaces: 2 });
    return filePath;
  }

  static pathFor(dir: string, edition: number): string {
    return path.join(dir, `${edition}.json`);
  }
}
