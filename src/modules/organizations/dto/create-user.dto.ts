import { IsString, Length, Matches } from 'class-validator';

export const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;

export class CreateUserDto {
  @IsString()
  @Length(5, 255)
  @Matches(EMAIL_PATTERN, { message: 'Invalid email format.' })
  email!: string;

  @IsString()
  @Length(2, 200)
  full_name!: string;
}
