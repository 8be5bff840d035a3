import { IsInt, IsNotEmpty, IsOptional, IsPositive, IsString, IsUrl, Min } from 'class-validator';

export class CliOptionsDto {
  @IsNotEmpty({ message: '--url is required' })
  @IsUrl({ require_tld: false, require_protocol: true }, { message: '--url must be an http(s) URL' })
  url!: string;

  @IsString()
  @IsNotEmpty({ message: '--token is required' })
  token!: string;

  @IsInt({ message: '--threads must be an integer' })
  @Min(1, { message: '--threads must be at least 1' })
  threads: number = 8;

  @IsOptional()
  @IsInt({ message: '--courseid must be an integer' })
  @IsPositive({ message: '--courseid must be positive' })
  courseid?: number;

  @IsOptional()
  @IsString()
  @IsNotEmpty({ message: '--courses_file must not be empty' })
  courses_file?: string;
}
