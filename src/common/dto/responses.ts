import { ApiProperty } from '@nestjs/swagger';

export type ErrorKind =
  | 'BadRequest'
  | 'Unauthorized'
  | 'NotFound'
  | 'MethodNotAllowed'
  | 'Conflict'
  | 'ServiceUnavailable'
  | 'Internal';

/** Simple response with a message */
export class MessageResponse {
  @ApiProperty({ example: 'Item already exists: esgrove' })
  message!: string;
}

export class ClearItemsResponse extends MessageResponse {
  @ApiProperty({ example: 5 })
  removed!: number;
}

/** Body of every non-2xx response */
export class ErrorResponse {
  @ApiProperty({ example: 'Conflict' })
  error!: ErrorKind;

  @ApiProperty({ example: 'Item already exists: esgrove' })
  message!: string;
}
