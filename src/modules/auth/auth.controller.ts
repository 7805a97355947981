import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  UseGuards,
} from '@nestjs/common';
import {
  AuthContext,
  BearerAuthGuard,
  RequestContext,
} from '../../core/auth';
import { AuthService } from './auth.service';
import { AuthResponseDto, TokenResponseDto } from './dto/auth-response.dto';
import { RegisterDto } from './dto/register.dto';

@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('register')
  @HttpCode(HttpStatus.CREATED)
  register(@Body() payload: RegisterDto): Promise<AuthResponseDto> {
    return this.authService.register(payload);
  }

  @Post('tokens/rotate')
  @HttpCode(HttpStatus.OK)
  @UseGuards(BearerAuthGuard)
  rotateToken(@AuthContext() context: RequestContext): Promise<TokenResponseDto> {
    return this.authService.rotateToken(context);
  }
}
