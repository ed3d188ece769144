// src/services/authService.ts
import bcrypt from 'bcryptjs';
import { LoginSchema, RegisterSchema } from '../schemas/requestSchemas.js';
import { parseInput } from '../schemas/validate.js';
import { IUserStore, StoredUser } from '../types/services.js';
import { AppError, AuthenticationError } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';
import { generateToken, TokenPayload, verifyToken } from '../utils/tokenGenerator.js';

export interface PublicUser {
  id: string;
  email: string;
  name: string;
  createdAt: Date;
}

export interface AuthResult {
  user: PublicUser;
  token: string;
}

function toPublicUser(user: StoredUser): PublicUser {
  return { id: user.id, email: user.email, name: user.name, createdAt: user.createdAt };
}

export class AuthService {
  constructor(
    private users: IUserStore,
    private jwtSecret: string,
    private saltRounds: number = 10
  ) {}

  async register(rawInput: unknown): Promise<AuthResult> {
    const input = parseInput(RegisterSchema, rawInput);

    const existing = await this.users.findByEmail(input.email);
    if (existing) {
      throw new AppError('User already exists', 400, 'UserExists');
    }

    const salt = await bcrypt.genSalt(this.saltRounds);
    const passwordHash = await bcrypt.hash(input.password, salt);
    const user = await this.users.create({ email: input.email, name: input.name, passwordHash });

    logger.info('[AUTH] User registered', { userId: user.id });
    return { user: toPublicUser(user), token: generateToken(user.id, this.jwtSecret) };
  }

  async login(rawInput: unknown): Promise<AuthResult> {
    const input = parseInput(LoginSchema, rawInput);

    const user = await this.users.findByEmail(input.email);
    if (!user) {
      throw new AuthenticationError('Invalid credentials');
    }

    const isMatch = await bcrypt.compare(input.password, user.passwordHash);
    if (!isMatch) {
      throw new AuthenticationError('Invalid credentials');
    }

    logger.info('[AUTH] User logged in', { userId: user.id });
    return { user: toPublicUser(user), token: generateToken(user.id, this.jwtSecret) };
  }

  async getProfile(userId: string): Promise<PublicUser> {
    const user = await this.users.findById(userId);
    if (!user) {
      throw new AppError('User not found', 404, 'UserNotFound');
    }
    return toPublicUser(user);
  }

  verify(token: string): TokenPayload {
    return verifyToken(token, this.jwtSecret);
  }
}
