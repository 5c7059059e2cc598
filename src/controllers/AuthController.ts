/**
 * Authentication controller: exchanges the service API key for a JWT
 */

import { Request, Response } from 'express';
import { timingSafeEqual } from 'crypto';
import jwt from 'jsonwebtoken';
import { AuthenticatedRequest } from '../middleware/auth';

export interface AuthConfig {
  apiKey: string;
  jwtSecret: string;
  expiresInSeconds: number;
}

function sameSecret(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export class AuthController {
  constructor(private readonly config: AuthConfig) {}

  /**
   * POST /api/v1/auth/login
   */
  login = async (req: Request, res: Response): Promise<void> => {
    try {
      const body: unknown = req.body;
      const apiKey = typeof body === 'object' && body !== null && 'apiKey' in body ? body.apiKey : undefined;

      if (typeof apiKey !== 'string' || apiKey.length === 0) {
        res.status(400).json({
          error: 'Missing API key',
          message: 'apiKey is required'
        });
        return;
      }

      if (!sameSecret(apiKey, this.config.apiKey)) {
        res.status(401).json({
          error: 'Invalid API key',
          message: 'The provided API key is not valid'
        });
        return;
      }

      const accessToken = jwt.sign({ role: 'client' }, this.config.jwtSecret, {
        subject: 'api-client',
        expiresIn: this.config.expiresInSeconds
      });

      res.json({
        accessToken,
        tokenType: 'bearer',
        expiresIn: this.config.expiresInSeconds
      });
    } catch (error) {
      console.error('❌ Login failed:', error);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to issue access token'
      });
    }
  };

  /**
   * GET /api/v1/auth/verify
   */
  verify = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
    res.json({
      valid: true,
      user: req.user
    });
  };
}
