import { ApiProperty } from '@nestjs/swagger';

export class Item {
  @ApiProperty({ example: 1234 })
  id!: number;

  @ApiProperty({ example: 'esgrove' })
  name!: string;
}
