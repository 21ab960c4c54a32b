import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Carrier } from './entities/carrier.entity';
import { toCarrierProfile, type CarrierProfile } from './carrier-profile';

@Injectable()
export class CarriersService {
  constructor(
    @InjectRepository(Carrier)
    private readonly carriers: Repository<Carrier>,
  ) {}

  /** Active, non-blacklisted carriers in a stable order. */
  findActive(): Promise<Carrier[]> {
    return this.carriers.find({
      where: { active: true, blacklisted: false },
      order: { createdAt: 'ASC', id: 'ASC' },
    });
  }

  async findActiveProfiles(): Promise<CarrierProfile[]> {
    const carriers = await this.findActive();
    return carriers.map(toCarrierProfile);
  }
}
