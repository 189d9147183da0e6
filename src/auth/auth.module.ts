// File overview:
// - Purpose: Auth providers bundle for the admin surface.
// - Reached from: Imported by `AppModule`.
// - Provides: `ApiKeyGuard`, exported for controllers using `@UseGuards(ApiKeyGuard)`.
import { Module } from '@nestjs/common';
import { ApiKeyGuard } from './api-key.guard';

@Module({
  providers: [ApiKeyGuard],
  exports: [ApiKeyGuard],
})
export class AuthModule {}
