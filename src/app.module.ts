import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule } from './config/config.module';
import { AuthorizationGuard } from './common/guards/authorization.guard';
import { ChatModule } from './modules/chat/chat.module';
import { ModelModule } from './modules/model/model.module';

@Module({
  imports: [ConfigModule, ChatModule, ModelModule],
  providers: [
    {
      provide: APP_GUARD,
      useClass: AuthorizationGuard,
    },
  ],
})
export class AppModule {}
