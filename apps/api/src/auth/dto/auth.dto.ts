import { IsNotEmpty, IsString, Matches, MaxLength, MinLength } from 'class-validator';

// Empty values are allowed through so login can report them as missing credentials
export class LoginDto {
  @IsString()
  userId!: string;

  @IsString()
  password!: string;
}

export class CreateUserDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  @Matches(/^[^:\s]+$/, { message: 'userId may not contain ":" or whitespace' })
  userId!: string;

  @IsString()
  @MinLength(8)
  password!: string;
}
