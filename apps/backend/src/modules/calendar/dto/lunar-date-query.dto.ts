import { ApiProperty } from "@nestjs/swagger";
import { Transform, Type } from "class-transformer";
import { IsBoolean, IsInt, IsOptional, Max, Min } from "class-validator";

export class LunarDateQueryDto {
  @ApiProperty({ description: "Lunar year (1900-2100)", example: 2024 })
  @Type(() => Number)
  @IsInt()
  @Min(1900)
  @Max(2100)
  year!: number;

  @ApiProperty({ description: "Lunar month (1-12)", example: 8 })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(12)
  month!: number;

  @ApiProperty({ description: "Lunar day (1-30)", example: 15 })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(30)
  day!: number;

  @ApiProperty({
    description: "Whether the month is the year's leap month",
    example: false,
    required: false,
  })
  @Transform(({ value }) => {
    if (value === "true") return true;
    if (value === "false") return false;
    return value;
  })
  @IsBoolean()
  @IsOptional()
  isLeapMonth?: boolean;
}
