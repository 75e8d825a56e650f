import type { Request, Response, NextFunction } from 'express';
import { JWTService } from '../common/jwt.service';
import sendHTTPResponse from '../common/sendHTTPResponse';

export interface AdminRequest extends Request {
  admin?: {
    adminId: number;
  };
}

// Bearer JWT whose adminId is one of the configured admin ids
export const requireAdmin = (secret: string, adminIds: readonly number[]) =>
  (req: AdminRequest, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;
    const token = authHeader && authHeader.split(' ')[1]; // Bearer TOKEN

    if (!token) {
      return sendHTTPResponse.error(res, 401, 'Access token is required');
    }

    const decoded = JWTService.verifyAdminToken(token, secret);
    if (!decoded) {
      return sendHTTPResponse.error(res, 401, 'Invalid or expired access token');
    }

    if (!adminIds.includes(decoded.adminId)) {
      return sendHTTPResponse.error(res, 403, 'Admin access required');
    }

    req.admin = { adminId: decoded.adminId };
    next();
  };
