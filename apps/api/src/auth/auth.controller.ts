import { Body, Controller, Get, HttpCode, HttpStatus, Post, Req } from '@nestjs/common';
import { Public } from './public.decorator';
import { SessionService, IssuedSession } from './session.service';
import { UsersService, RegisteredUser } from './users.service';
import { InvalidTokenError } from './session.errors';
import { SessionRequest } from './session-request';
import { CreateUserDto, LoginDto } from './dto/auth.dto';

@Controller('auth')
export class AuthController {
  constructor(
    private readonly sessionService: SessionService,
    private readonly usersService: UsersService,
  ) {}

  @Public()
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() dto: LoginDto): Promise<IssuedSession> {
    return this.sessionService.login(dto.userId, dto.password);
  }

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  async refresh(@Req() req: SessionRequest): Promise<IssuedSession> {
    const session = await this.sessionService.refreshToken(req.sessionToken);
    if (!session) {
      throw new InvalidTokenError('Session is invalid or expired');
    }
    return session;
  }

  @Post('logout')
  @HttpCode(HttpStatus.OK)
  async logout(@Req() req: SessionRequest): Promise<{ success: true }> {
    await this.sessionService.revokeToken(req.sessionToken);
    return { success: true };
  }

  @Get('me')
  me(@Req() req: SessionRequest): { userId: string } {
    if (!req.userId) {
      throw new InvalidTokenError('No session on request');
    }
    return { userId: req.userId };
  }

  @Post('users')
  async createUser(@Body() dto: CreateUserDto): Promise<RegisteredUser> {
    return this.usersService.register(dto.userId, dto.password);
  }
}
