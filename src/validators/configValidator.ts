import Joi from 'joi';
import { CollectionConfig } from '../types/config';
import { GeneratorError, ErrorType } from '../types/errors';
import { VALIDATION_RULES, ERROR_MESSAGES, formatMessage } from '../constants/validation';
import logger from '../utils/logger';

const rarities = Joi.array().items(Joi.number().min(0));

export class ConfigValidator {
  private schema: Joi.ObjectSchema<CollectionConfig>;

  constructor() {
    this.schema = Joi.object<CollectionConfig>({
      layers: Joi.array().items(
        Joi.object({
          name: Joi.string().required(),
          rarities,
          types: Joi.array().items(
            Joi.object().pattern(Joi.string(), rarities).length(1)
          ).min(1),
          required: Joi.boolean().default(true)
        }).or('rarities', 'types')
      ).min(1).max(VALIDATION_RULES.MAX_LAYER_COUNT).required(),

      amount: Joi.number().integer()
        .min(VALIDATION_RULES.MIN_TOKEN_COUNT)
        .max(VALIDATION_RULES.MAX_TOKEN_COUNT)
        .required(),
      id_from_one: Joi.boolean().default(false),

      token_prefix: Joi.string().allow('').required(),
      description: Joi.string().allow('').required(),
      uri_prefix: Joi.string().allow('').required(),

      draw_background: Joi.boolean().default(false),
      canvas_width: Joi.number().integer()
        .min(VALIDATION_RULES.MIN_DIMENSIONS)
        .max(VALIDATION_RULES.MAX_DIMENSIONS)
        .default(512),
      canvas_height: Joi.number().integer()
        .min(VALIDATION_RULES.MIN_DIMENSIONS)
        .max(VALIDATION_RULES.MAX_DIMENSIONS)
        .default(512),
      background_color: Joi.alternatives().try(
        Joi.string(),
        Joi.array().items(Joi.number().integer().min(0).max(255)).min(3).max(4)
      ).default('#ffffff'),

      rich_metadata: Joi.boolean().default(false),
      paintswap_metadata: Joi.boolean().default(false),

      assets_dir: Joi.string().default('assets'),
      output_dir: Joi.string().default('build'),
      seed: Joi.alternatives().try(Joi.number().integer(), Joi.string()).optional(),
      max_duplicate_retries: Joi.number().integer().min(1)
        .default(VALIDATION_RULES.DEFAULT_MAX_DUPLICATE_RETRIES)
    });
  }

  validate(config: unknown): CollectionConfig {
    const result = this.schema.validate(config, {
      abortEarly: false,
      stripUnknown: true
    });

    if (result.error) {
      const errorMessages = result.error.details.map(detail => detail.message);
      throw new GeneratorError(
        ErrorType.CONFIG_ERROR,
        formatMessage(ERROR_MESSAGES.CONFIG_VALIDATION_FAILED, { errors: errorMessages.join(', ') }),
        { errors: errorMessages }
      );
    }

    const value = result.value;
    logger.debug('Configuration validation passed', { layers: value.layers.length, amount: value.amount });
    return value;
  }

  createDefaultConfig(): CollectionConfig {
    return {
      layers: [
        { name: 'background', rarities: [50, 30, 20], required: true },
        { name: 'body', rarities: [60, 40], required: true },
        { name: 'eyes', types: [{ round: [30, 30] }, { narrow: [20, 20] }], required: true },
        { name: 'hats', rarities: [25, 15], required: false }
      ],
      amount: 100,
      id_from_one: false,
      token_prefix: 'Token',
      description: 'Procedurally generated collection',
      uri_prefix: 'ipfs://',
      draw_background: false,
      canvas_width: 512,
      canvas_height: 512,
      background_color: '#ffffff',
      rich_metadata: false,
      paintswap_metadata: false,
      assets_dir: 'assets',
      output_dir: 'build',
      max_duplicate_retries: VALIDATION_RULES.DEFAULT_MAX_DUPLICATE_RETRIES
    };
  }
}
