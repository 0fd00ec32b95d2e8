import { ApiProperty } from "@nestjs/swagger";
import { Type } from "class-transformer";
import { IsInt, Max, Min } from "class-validator";

export class SolarDateQueryDto {
  @ApiProperty({ description: "Gregorian year (1900-2100)", example: 2024 })
  @Type(() => Number)
  @IsInt()
  @Min(1900)
  @Max(2100)
  year!: number;

  @ApiProperty({ description: "Gregorian month (1-12)", example: 9 })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(12)
  month!: number;

  @ApiProperty({ description: "Day of month", example: 17 })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(31)
  day!: number;
}
