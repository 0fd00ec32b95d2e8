import { ApiProperty } from "@nestjs/swagger";
import { IsNotEmpty, IsString } from "class-validator";

export class DateQueryDto {
  @ApiProperty({
    description: "Gregorian date (YYYY-MM-DD or YYYYMMDD)",
    example: "2024-09-17",
  })
  @IsString()
  @IsNotEmpty()
  date!: string;
}
