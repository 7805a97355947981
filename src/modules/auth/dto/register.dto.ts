import { IsString, Length, Matches } from 'class-validator';
import { CreateUserDto } from '../../organizations/dto/create-user.dto';

export class RegisterDto extends CreateUserDto {
  @IsString()
  @Length(2, 200)
  organization_name!: string;

  @IsString()
  @Length(3, 80)
  @Matches(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, {
    message: 'organization_slug must be lowercase kebab-case',
  })
  organization_slug!: string;
}
