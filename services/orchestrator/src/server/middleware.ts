/**
 * HTTP Middleware
 * Input validation, CORS and request logging
 */

import type { NextFunction, Request, Response } from 'express';
import { createLogger } from '../utils/logger.js';

const log = createLogger('HTTP');

export interface FieldSchema {
  type: 'string' | 'number' | 'boolean' | 'object' | 'array';
  required?: boolean;
  minLength?: number;
  maxLength?: number;
  min?: number;
  max?: number;
  pattern?: RegExp;
  enum?: readonly string[];
}

export type ObjectSchema = Record<string, FieldSchema>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check a request object against a field schema
 * @returns one message per problem, empty when valid
 */
export function validateFields(input: unknown, schema: ObjectSchema, location: string): string[] {
  if (!isRecord(input)) {
    return [`${location} must be an object`];
  }

  const errors: string[] = [];

  for (const [field, rules] of Object.entries(schema)) {
    const value = input[field];

    if (rules.required && (value === undefined || value === null || (typeof value === 'string' && value.trim() === ''))) {
      errors.push(`${location}.${field} is required`);
      continue;
    }

    // Skip validation if not present and not required
    if (value === undefined || value === null) continue;

    const actualType = Array.isArray(value) ? 'array' : typeof value;
    if (actualType !== rules.type) {
      errors.push(`${location}.${field} must be a ${rules.type}`);
      continue;
    }

    if (typeof value === 'string') {
      if (rules.minLength !== undefined && value.length < rules.minLength) {
        errors.push(`${location}.${field} must be at least ${rules.minLength} characters`);
      }
      if (rules.maxLength !== undefined && value.length > rules.maxLength) {
        errors.push(`${location}.${field} must be at most ${rules.maxLength} characters`);
      }
      if (rules.pattern && !rules.pattern.test(value)) {
        errors.push(`${location}.${field} has invalid format`);
      }
      if (rules.enum && !rules.enum.includes(value)) {
        errors.push(`${location}.${field} must be one of: ${rules.enum.join(', ')}`);
      }
    }

    if (typeof value === 'number') {
      if (rules.min !== undefined && value < rules.min) {
        errors.push(`${location}.${field} must be at least ${rules.min}`);
      }
      if (rules.max !== undefined && value > rules.max) {
        errors.push(`${location}.${field} must be at most ${rules.max}`);
      }
    }
  }

  return errors;
}

/**
 * CORS for the chat frontend
 */
export function corsMiddleware(allowedOrigins: readonly string[]) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const origin = req.headers.origin;

    if (origin && allowedOrigins.includes(origin)) {
      res.setHeader('Access-Control-Allow-Origin', origin);
    } else if (allowedOrigins.includes('*')) {
      res.setHeader('Access-Control-Allow-Origin', '*');
    }

    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, X-Request-ID');
    res.setHeader('Access-Control-Max-Age', '86400'); // 24 hours

    // Handle preflight requests
    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }

    next();
  };
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  res.on('finish', () => {
    log.debug(`${req.method} ${req.path} ${res.statusCode}`, { durationMs: Date.now() - startTime });
  });
  next();
}
