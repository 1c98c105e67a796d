import { IsInt, IsNotEmpty, IsOptional, IsString, Matches, Min } from "class-validator";

export class SummarizeTextRequestDto {
  @IsString()
  @Matches(/\S/, { message: "text must not be blank" })
  text!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  sentenceCount?: number;
}

export class SummarizeObjectRequestDto {
  @IsString()
  @IsNotEmpty()
  bucket!: string;

  @IsString()
  @IsNotEmpty()
  key!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  sentenceCount?: number;
}
