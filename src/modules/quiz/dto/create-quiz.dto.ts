import {
  IsBase64,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

export class CreateQuizDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  name!: string;

  @IsString()
  @IsNotEmpty()
  text!: string;
}

export class UploadQuizDocumentDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  name!: string;

  @IsBase64()
  content!: string;

  @IsString()
  @IsNotEmpty()
  format!: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  fileName?: string;
}
