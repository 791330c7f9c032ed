import { Module, OnModuleInit } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { APP_FILTER, APP_GUARD } from '@nestjs/core';
import { User } from '../entities/user.entity';
import { AuthController } from './auth.controller';
import { AUTH_VERIFIER } from './auth-verifier';
import { SessionAuthGuard } from './session-auth.guard';
import { resolveSessionFile, resolveSessionOptions } from './session.config';
import { SessionExceptionFilter } from './session-exception.filter';
import { SessionJanitorService } from './session-janitor.service';
import { SessionStore } from './session-store';
import { SessionService, SESSION_OPTIONS } from './session.service';
import { UsersService } from './users.service';

@Module({
  imports: [TypeOrmModule.forFeature([User])],
  controllers: [AuthController],
  providers: [
    UsersService,
    { provide: AUTH_VERIFIER, useExisting: UsersService },
    {
      provide: SESSION_OPTIONS,
      useFactory: resolveSessionOptions,
      inject: [ConfigService],
    },
    {
      provide: SessionStore,
      useFactory: (configService: ConfigService) => new SessionStore(resolveSessionFile(configService)),
      inject: [ConfigService],
    },
    SessionService,
    SessionJanitorService,
    // Every route needs a session unless marked @Public()
    {
      provide: APP_GUARD,
      useClass: SessionAuthGuard,
    },
    {
      provide: APP_FILTER,
      useClass: SessionExceptionFilter,
    },
  ],
  exports: [SessionService],
})
export class AuthModule implements OnModuleInit {
  constructor(private readonly usersService: UsersService) {}

  async onModuleInit() {
    await this.usersService.createInitialAdmin();
  }
}
