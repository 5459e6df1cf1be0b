import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { CHANNELS } from '../types';
import { ValidationError } from './errorHandler';

/**
 * Validation Middleware
 *
 * Provides reusable validation schemas and middleware for request validation
 */

/**
 * Common validation schemas
 */
export const commonSchemas = {
  uuid: Joi.string().uuid(),
  channel: Joi.string().valid(...CHANNELS),
  platformId: Joi.string().trim().min(1).max(255),
  limit: Joi.number().integer().min(1).max(100),
};

/**
 * Message validation schemas
 */
export const messageSchemas = {
  sendMessage: Joi.object({
    accountId: commonSchemas.uuid.required(),
    recipientId: commonSchemas.platformId.required(),
    text: Joi.string().min(1).max(2000),
    media: Joi.object({
      type: Joi.string().valid('image', 'video', 'audio').required(),
      url: Joi.string().uri({ scheme: ['http', 'https'] }).required(),
    }),
  }).xor('text', 'media'),
  messageId: Joi.object({
    messageId: commonSchemas.uuid.required(),
  }),
};

/**
 * Account validation schemas
 */
export const accountSchemas = {
  accountId: Joi.object({
    accountId: commonSchemas.uuid.required(),
  }),
  conversationParams: Joi.object({
    accountId: commonSchemas.uuid.required(),
    conversationId: commonSchemas.platformId.required(),
  }),
  listQuery: Joi.object({
    limit: commonSchemas.limit.default(25),
  }),
  subscribeWebhook: Joi.object({
    webhookUrl: Joi.string().uri({ scheme: ['https', 'http'] }).optional(),
    fields: Joi.array().items(Joi.string().min(1)).min(1).optional(),
  }),
};

/**
 * Webhook validation schemas
 */
export const webhookSchemas = {
  channel: Joi.object({
    channel: commonSchemas.channel.required(),
  }),
};

/**
 * Generic validation middleware factory
 */
export const validate = (schema: Joi.Schema, property: 'body' | 'query' | 'params' = 'body') => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const { error, value } = schema.validate(req[property], {
      abortEarly: false,
      stripUnknown: true,
    });

    if (error) {
      const errors = error.details.map((detail) => ({
        field: detail.path.join('.'),
        message: detail.message,
      }));

      next(new ValidationError('Request validation failed', errors));
      return;
    }

    // Replace request property with validated value
    req[property] = value;
    next();
  };
};
