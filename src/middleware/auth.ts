/**
 * Authentication middleware for JWT token validation
 */

import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';

export interface AuthenticatedRequest extends Request {
  user?: {
    id: string;
    role: string;
  };
}

function readUser(decoded: string | jwt.JwtPayload): { id: string; role: string } | null {
  if (typeof decoded === 'string' || typeof decoded.sub !== 'string') {
    return null;
  }
  const role = typeof decoded.role === 'string' ? decoded.role : 'client';
  return { id: decoded.sub, role };
}

/**
 * Middleware to authenticate JWT tokens
 */
export function authenticateToken(jwtSecret: string) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const authHeader = req.headers['authorization'];
    const token = authHeader && authHeader.split(' ')[1]; // Bearer TOKEN

    if (!token) {
      res.status(401).json({
        error: 'Access token required',
        message: 'Please provide a valid access token'
      });
      return;
    }

    try {
      const user = readUser(jwt.verify(token, jwtSecret));
      if (!user) {
        res.status(403).json({
          error: 'Invalid token',
          message: 'Access token has no subject'
        });
        return;
      }
      req.user = user;
      next();
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        res.status(401).json({
          error: 'Token expired',
          message: 'Access token has expired. Please log in again.'
        });
      } else if (error instanceof jwt.JsonWebTokenError) {
        res.status(403).json({
          error: 'Invalid token',
          message: 'Access token is invalid'
        });
      } else {
        console.error('❌ Token authentication failed:', error);
        res.status(500).json({
          error: 'Authentication error',
          message: 'Unable to authenticate token'
        });
      }
    }
  };
}
