import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsOptional, IsString, Matches, Max, Min } from 'class-validator';

export const MIN_CLIENT_ID = 1000;
export const MAX_CLIENT_ID = 9999;

export class CreateItemDto {
  @ApiProperty({ example: 'esgrove' })
  @IsString()
  @Matches(/\S/, { message: 'name must not be blank' })
  name!: string;

  /** Optional id, allowing clients to pick one instead of having the server assign it */
  @ApiPropertyOptional({ example: 1234, minimum: MIN_CLIENT_ID, maximum: MAX_CLIENT_ID })
  @IsOptional()
  @IsInt()
  @Min(MIN_CLIENT_ID)
  @Max(MAX_CLIENT_ID)
  id?: number;
}

export class ItemQueryDto {
  @ApiProperty({ example: 'esgrove' })
  @IsString()
  name!: string;
}
