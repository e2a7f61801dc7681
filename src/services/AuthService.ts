import jwt from 'jsonwebtoken';
import bcrypt from 'bcryptjs';
import { z } from 'zod';
import { config } from '../config';
import { IUserRepository } from '../database/repositories/user';
import { IEmployeeProfileRepository } from '../database/repositories/employeeProfile';
import { Principal, PublicUser, ROLES, toPrincipal, toPublicUser, User } from '../models/User';
import { AuthenticationError, mapJWTError } from '../utils/errors';
import { logger } from '../utils/logger';

const ISSUER = 'workforce-hr';
const AUDIENCE = 'workforce-hr-api';

const claimsSchema = z.object({
  sub: z.string().uuid(),
  role: z.enum(ROLES)
});

export type AccessTokenClaims = z.infer<typeof claimsSchema>;

export interface LoginResponse {
  accessToken: string;
  expiresIn: number;
  user: PublicUser;
}

export interface AuthenticatedUser {
  user: User;
  principal: Principal;
}

export interface AuthServiceOptions {
  users: IUserRepository;
  profiles: IEmployeeProfileRepository;
  jwtSecret?: string;
  expiresInSeconds?: number;
  saltRounds?: number;
}

export class AuthService {
  private readonly users: IUserRepository;
  private readonly profiles: IEmployeeProfileRepository;
  private readonly jwtSecret: string;
  private readonly expiresInSeconds: number;
  private readonly saltRounds: number;

  constructor(options: AuthServiceOptions) {
    this.users = options.users;
    this.profiles = options.profiles;
    this.jwtSecret = options.jwtSecret ?? config.jwt.secret;
    this.expiresInSeconds = options.expiresInSeconds ?? config.jwt.expiresInSeconds;
    this.saltRounds = options.saltRounds ?? 12;
  }

  async hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, this.saltRounds);
  }

  async verifyPassword(password: string, hashedPassword: string): Promise<boolean> {
    return bcrypt.compare(password, hashedPassword);
  }

  generateAccessToken(user: Pick<User, 'id' | 'role'>): string {
    const claims: AccessTokenClaims = { sub: user.id, role: user.role };
    return jwt.sign(claims, this.jwtSecret, {
      expiresIn: this.expiresInSeconds,
      issuer: ISSUER,
      audience: AUDIENCE
    });
  }

  /**
   * Verify the signature and expiry and return the claims
   */
  verifyAccessToken(token: string): AccessTokenClaims {
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, this.jwtSecret, { issuer: ISSUER, audience: AUDIENCE });
    } catch (error) {
      throw mapJWTError(error);
    }

    const claims = claimsSchema.safeParse(decoded);
    if (!claims.success) {
      throw new AuthenticationError('Invalid authentication token');
    }
    return claims.data;
  }

  extractTokenFromHeader(authHeader: string | undefined): string | null {
    if (!authHeader) {
      return null;
    }

    const parts = authHeader.split(' ');
    if (parts.length !== 2 || parts[0] !== 'Bearer') {
      return null;
    }

    return parts[1];
  }

  /**
   * Exchange username and password for an access token. Unknown users,
   * wrong passwords and deactivated accounts all get the same answer.
   */
  async login(username: string, password: string): Promise<LoginResponse> {
    const user = await this.users.findByUsername(username);
    const valid = user !== null && user.isActive && (await this.verifyPassword(password, user.passwordHash));

    if (!user || !valid) {
      logger.warn('Failed login attempt', { username });
      throw new AuthenticationError('Invalid username or password');
    }

    logger.info('User logged in', { userId: user.id });
    return {
      accessToken: this.generateAccessToken(user),
      expiresIn: this.expiresInSeconds,
      user: toPublicUser(user)
    };
  }

  /**
   * Resolve a bearer token to the active user behind it
   */
  async authenticate(token: string): Promise<AuthenticatedUser> {
    const claims = this.verifyAccessToken(token);
    const user = await this.users.findById(claims.sub);
    if (!user || !user.isActive) {
      throw new AuthenticationError('Account is not active');
    }

    const managerId = await this.profiles.findManagerId(user.id);
    return { user, principal: toPrincipal(user, managerId) };
  }
}
