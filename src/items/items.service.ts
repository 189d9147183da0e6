// File overview:
// - Purpose: Item use cases on top of `ItemStore`: list, lookup, create with id assignment, remove, clear.
// - Reached from: `ItemsController` (public routes) and `AdminController` (api-key routes).
// - Errors: store outcomes are mapped to Nest HTTP exceptions (404 / 409); rendering is left to `HttpExceptionFilter`.
import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ItemStore } from './item.store';
import { Item } from './item.entity';
import { CreateItemDto } from './dto/item.dto';

@Injectable()
export class ItemsService {
  private readonly logger = new Logger(ItemsService.name);

  constructor(private readonly store: ItemStore) {}

  list(): Item[] {
    const items = this.store.list();
    this.logger.debug(`List items: found ${items.length} items`);
    return items;
  }

  findByName(name: string): Item {
    const item = this.store.get(name);
    if (!item) {
      this.logger.debug(`Item not found: ${name}`);
      throw new NotFoundException(`Item does not exist: ${name}`);
    }
    return item;
  }

  create(dto: CreateItemDto): Item {
    const id = dto.id ?? this.store.nextId();
    const result = this.store.insert({ id, name: dto.name });
    if (!result.ok) {
      const message =
        result.reason === 'duplicate-name'
          ? `Item already exists: ${dto.name}`
          : `Item id already in use: ${id}`;
      this.logger.warn(message);
      throw new ConflictException(message);
    }
    this.logger.debug(`Create item: ${result.item.name} (${result.item.id})`);
    return result.item;
  }

  remove(name: string): Item {
    const removed = this.store.remove(name);
    if (!removed) {
      this.logger.warn(`Remove item failed for non-existing name: ${name}`);
      throw new NotFoundException(`Item does not exist: ${name}`);
    }
    this.logger.debug(`Remove item: ${name}`);
    return removed;
  }

  clear(): number {
    const removed = this.store.clear();
    this.logger.debug(`Delete all ${removed} items`);
    return removed;
  }

  count(): number {
    return this.store.size;
  }
}
