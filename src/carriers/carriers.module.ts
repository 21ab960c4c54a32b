import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Carrier } from './entities/carrier.entity';
import { CarriersService } from './carriers.service';

@Module({
  imports: [TypeOrmModule.forFeature([Carrier])],
  providers: [CarriersService],
  exports: [CarriersService],
})
export class CarriersModule {}
