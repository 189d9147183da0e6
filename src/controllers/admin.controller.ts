// File overview:
// - Purpose: Admin routes that require the shared `api-key` header.
// - Routes: DELETE /admin/remove/:name, DELETE /admin/clear_items; any other verb on these paths is 405.
// - Ordering: method dispatch runs before the guard, so a wrong verb gets 405 with or without a key.
import {
  All,
  Controller,
  Delete,
  HttpCode,
  HttpStatus,
  MethodNotAllowedException,
  Param,
  Req,
  UseGuards,
} from '@nestjs/common';
import {
  ApiExcludeEndpoint,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiSecurity,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { Request } from 'express';
import { ApiKeyGuard } from '../auth/api-key.guard';
import { ItemsService } from '../items/items.service';
import { Item } from '../items/item.entity';
import { ClearItemsResponse, ErrorResponse } from '../common/dto/responses';

@ApiTags('admin')
@ApiSecurity('api_key')
@ApiUnauthorizedResponse({ type: ErrorResponse, description: 'Missing or invalid api-key header' })
@Controller('admin')
export class AdminController {
  constructor(private readonly itemsService: ItemsService) {}

  /** Remove all items. */
  @Delete('clear_items')
  @UseGuards(ApiKeyGuard)
  @HttpCode(HttpStatus.OK)
  @ApiOkResponse({ type: ClearItemsResponse, description: 'Report number of items deleted' })
  clearItems(): ClearItemsResponse {
    const removed = this.itemsService.clear();
    return { message: `Removed ${removed} items`, removed };
  }

  /** Remove item with given name. */
  @Delete('remove/:name')
  @UseGuards(ApiKeyGuard)
  @HttpCode(HttpStatus.OK)
  @ApiOkResponse({ type: Item, description: 'Item removed' })
  @ApiNotFoundResponse({ type: ErrorResponse, description: 'Item does not exist' })
  removeItem(@Param('name') name: string): Item {
    return this.itemsService.remove(name);
  }

  // Registered after the DELETE handlers so they match first
  @All(['clear_items', 'remove/:name'])
  @ApiExcludeEndpoint()
  methodNotAllowed(@Req() request: Request): never {
    throw new MethodNotAllowedException(`Method ${request.method} not allowed for ${request.path}`);
  }
}
