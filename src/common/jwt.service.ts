import * as jwt from 'jsonwebtoken';

interface AdminTokenPayload extends jwt.JwtPayload {
  adminId: number;
}

export class JWTService {
  private static readonly ISSUER = 'tenant-relay';
  private static readonly AUDIENCE = 'relay-admin';
  private static readonly ADMIN_TOKEN_EXPIRY_SECONDS = 60 * 60;

  static generateAdminToken(adminId: number, secret: string, expiresInSeconds: number = this.ADMIN_TOKEN_EXPIRY_SECONDS): string {
    if (!secret) {
      throw new Error('JWT_ADMIN_SECRET is not defined');
    }
    return jwt.sign({ adminId }, secret, {
      expiresIn: expiresInSeconds,
      issuer: this.ISSUER,
      audience: this.AUDIENCE
    });
  }

  static verifyAdminToken(token: string, secret: string): AdminTokenPayload | null {
    if (!secret) {
      return null;
    }
    try {
      const decoded = jwt.verify(token, secret, {
        issuer: this.ISSUER,
        audience: this.AUDIENCE
      });
      if (typeof decoded === 'string' || typeof decoded.adminId !== 'number') {
        return null;
      }
      return { ...decoded, adminId: decoded.adminId };
    } catch (error) {
      // expired, malformed and wrongly signed tokens all read as "no token"
      return null;
    }
  }
}
