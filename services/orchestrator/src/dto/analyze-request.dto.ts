import { IsNotEmpty, IsNumber, IsOptional, IsString, Max, Min } from "class-validator";

export class AnalyzeMediaRequestDto {
  @IsString()
  @IsNotEmpty()
  bucket!: string;

  @IsString()
  @IsNotEmpty()
  key!: string;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(1)
  confidenceThreshold?: number;
}
