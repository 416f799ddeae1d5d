import { Global, Module } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { TypeOrmModule } from '@nestjs/typeorm'
import { ChargingStore } from './charging-store'
import { ENTITIES } from './entities'
import { TypeOrmChargingStore } from './typeorm-charging-store.service'

@Global()
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        type: 'postgres' as const,
        url: config.get<string>('database.url'),
        ssl: config.get<boolean>('database.ssl') ? { rejectUnauthorized: false } : false,
        synchronize: config.get<boolean>('database.synchronize') ?? false,
        logging: config.get<boolean>('database.logging') ?? false,
        entities: ENTITIES,
        extra: { max: config.get<number>('database.poolSize') ?? 10 },
      }),
    }),
    TypeOrmModule.forFeature(ENTITIES),
  ],
  providers: [{ provide: ChargingStore, useClass: TypeOrmChargingStore }],
  exports: [ChargingStore, TypeOrmModule],
})
export class PersistenceModule {}
