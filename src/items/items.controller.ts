// File overview:
// - Purpose: Public item routes that anyone can call.
// - Routes: GET /items (list), GET /item?name= (lookup), POST /items (create).
// - Validation: bodies and queries go through the global ValidationPipe with `CreateItemDto` / `ItemQueryDto`.
import { Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiConflictResponse,
  ApiCreatedResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiTags,
} from '@nestjs/swagger';
import { ItemsService } from './items.service';
import { Item } from './item.entity';
import { CreateItemDto, ItemQueryDto } from './dto/item.dto';
import { ErrorResponse } from '../common/dto/responses';

@ApiTags('items')
@Controller()
export class ItemsController {
  constructor(private readonly itemsService: ItemsService) {}

  @Get('items')
  @ApiOkResponse({ type: Item, isArray: true, description: 'All items sorted by name' })
  list(): Item[] {
    return this.itemsService.list();
  }

  /** Get item info, looked up by name from the query string */
  @Get('item')
  @ApiOkResponse({ type: Item, description: 'Found existing item' })
  @ApiNotFoundResponse({ type: ErrorResponse, description: 'Item does not exist' })
  @ApiBadRequestResponse({ type: ErrorResponse, description: 'Missing name parameter' })
  find(@Query() query: ItemQueryDto): Item {
    return this.itemsService.findByName(query.name);
  }

  @Post('items')
  @HttpCode(HttpStatus.CREATED)
  @ApiCreatedResponse({ type: Item, description: 'New item created' })
  @ApiConflictResponse({ type: ErrorResponse, description: 'Item already exists' })
  @ApiBadRequestResponse({ type: ErrorResponse, description: 'Malformed JSON or invalid fields' })
  create(@Body() dto: CreateItemDto): Item {
    return this.itemsService.create(dto);
  }
}
