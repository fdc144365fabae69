import { IsNotEmpty, IsObject, IsOptional, IsString, IsUrl } from "class-validator";

export class PreviewRequestDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  jobId?: string;

  @IsOptional()
  @IsObject()
  object?: Record<string, unknown>;

  @IsOptional()
  @IsUrl({ require_tld: false })
  objectUrl?: string;
}
