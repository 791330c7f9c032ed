import { BadRequestException, ConflictException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import * as bcrypt from 'bcrypt';
import { User } from '../entities/user.entity';
import { AuthVerifier } from './auth-verifier';
import { TOKEN_SEPARATOR } from './session-token';

export const BCRYPT_ROUNDS = 12;

export interface RegisteredUser {
  userId: string;
  createdAt: Date;
}

/** Credential store behind login: bcrypt hashes in the users table. */
@Injectable()
export class UsersService implements AuthVerifier {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepo: Repository<User>,
    private readonly configService: ConfigService,
  ) {}

  async register(userId: string, password: string): Promise<RegisteredUser> {
    if (userId.includes(TOKEN_SEPARATOR)) {
      throw new BadRequestException(`User id may not contain "${TOKEN_SEPARATOR}"`);
    }

    const existingUser = await this.userRepo.findOne({ where: { userId } });
    if (existingUser) {
      throw new ConflictException(`User ${userId} already exists`);
    }

    const passwordHash = await bcrypt.hash(password, BCRYPT_ROUNDS);
    const user = this.userRepo.create({ userId, passwordHash, isActive: true, lastLoginAt: null });
    const saved = await this.userRepo.save(user);

    this.logger.log(`User registered: ${userId}`);
    return { userId: saved.userId, createdAt: saved.createdAt };
  }

  async verify(userId: string, password: string): Promise<boolean> {
    const user = await this.userRepo.findOne({ where: { userId } });
    if (!user || !user.isActive) {
      return false;
    }

    const isPasswordValid = await bcrypt.compare(password, user.passwordHash);
    if (!isPasswordValid) {
      return false;
    }

    user.lastLoginAt = new Date();
    await this.userRepo.save(user);
    return true;
  }

  async createInitialAdmin(): Promise<void> {
    const userCount = await this.userRepo.count();
    if (userCount > 0) {
      return;
    }

    const adminId = this.configService.get<string>('ADMIN_USER_ID', 'admin');
    const configuredPassword = this.configService.get<string>('ADMIN_PASSWORD');
    await this.register(adminId, configuredPassword || 'changeme123!');
    if (!configuredPassword) {
      this.logger.warn(`Created default user "${adminId}" - CHANGE THE PASSWORD IMMEDIATELY`);
    } else {
      this.logger.log(`Created initial user "${adminId}"`);
    }
  }
}
