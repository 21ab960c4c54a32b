import { Test, TestingModule } from '@nestjs/testing';
import { CarriersService } from '../carriers/carriers.service';
import { MalformedCoverageError } from '../carriers/carrier-profile';
import { Carrier } from '../carriers/entities/carrier.entity';
import { CarrierRequest } from '../carrier-requests/entities/carrier-request.entity';
import { JobQueueService } from '../jobs/job-queue.service';
import { InMemoryDataSource } from '../testing/in-memory-data-source';
import { buildCarrier, buildTransportRequest } from '../testing/fixtures';
import { PackageItem } from '../transport-requests/entities/package-item.entity';
import { TransportRequest } from '../transport-requests/entities/transport-request.entity';
import { MatchingService } from './matching.service';

describe('MatchingService', () => {
  let service: MatchingService;
  let db: InMemoryDataSource;
  let jobs: { register: jest.Mock; enqueue: jest.Mock };

  const requests = () => db.getRepository(TransportRequest);
  const matches = () => db.getRepository(CarrierRequest);

  beforeEach(async () => {
    db = new InMemoryDataSource();
    jobs = { register: jest.fn(), enqueue: jest.fn().mockReturnValue('job-1') };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MatchingService,
        CarriersService,
        ...db.providers(TransportRequest, PackageItem, CarrierRequest, Carrier),
        { provide: JobQueueService, useValue: jobs },
      ],
    }).compile();

    service = module.get<MatchingService>(MatchingService);
  });

  async function seed(carriers: Carrier[], request = buildTransportRequest()) {
    await db.getRepository(Carrier).save(carriers);
    return requests().save(request);
  }

  it('registers the match_carriers job handler', () => {
    service.onModuleInit();
    expect(jobs.register).toHaveBeenCalledWith('match_carriers', expect.any(Function));
  });

  it('stores one new carrier request per match and queues invitations', async () => {
    const [near, far] = [
      buildCarrier({ companyName: 'Near', latitude: 52.4, longitude: 13.1 }),
      buildCarrier({ companyName: 'Far', latitude: 47.12, pickupRadiusKm: 100 }),
    ];
    const request = await seed([near, far]);

    const result = await service.runMatching(request.id);

    expect(result).toMatchObject({ status: 'matched', matchCount: 1 });
    const stored = await matches().findBy({ transportRequestId: request.id });
    expect(stored).toHaveLength(1);
    expect(stored[0]).toMatchObject({
      carrierId: near.id,
      status: 'new',
      inRadius: true,
      emailSentAt: null,
    });
    expect(stored[0].distanceToPickupKm).toBe(
      Math.round((stored[0].distanceToPickupKm ?? NaN) * 100) / 100,
    );
    expect(stored[0].distanceToDeliveryKm).not.toBeNull();

    expect((await requests().findOneBy({ id: request.id }))?.status).toBe('matching');
    expect(jobs.enqueue).toHaveBeenCalledWith('send_carrier_invitations', {
      transportRequestId: request.id,
    });
  });

  it('puts the request back to new when nobody matches', async () => {
    const request = await seed([buildCarrier({ deliveryCountries: ['FR'] })]);

    const result = await service.runMatching(request.id);

    expect(result).toEqual({ status: 'no_matches', transportRequestId: request.id });
    expect(await matches().count()).toBe(0);
    expect((await requests().findOneBy({ id: request.id }))?.status).toBe('new');
    expect(jobs.enqueue).not.toHaveBeenCalled();
  });

  it('leaves inactive and blacklisted carriers out of the pool', async () => {
    const request = await seed([
      buildCarrier({ companyName: 'Paused', active: false }),
      buildCarrier({ companyName: 'Banned', blacklisted: true }),
    ]);

    await expect(service.runMatching(request.id)).resolves.toMatchObject({
      status: 'no_matches',
    });
  });

  it.each(['matched', 'in_transit', 'delivered', 'cancelled'] as const)(
    'skips a request that is %s',
    async (status) => {
      const request = await seed([buildCarrier()], buildTransportRequest({ status }));

      const result = await service.runMatching(request.id);

      expect(result).toEqual({
        status: 'skipped',
        transportRequestId: request.id,
        reason: `request is ${status}`,
      });
      expect(await matches().count()).toBe(0);
      expect((await requests().findOneBy({ id: request.id }))?.status).toBe(status);
    },
  );

  it('resumes a request left in matching by an interrupted run', async () => {
    const request = await seed([buildCarrier()], buildTransportRequest({ status: 'matching' }));

    await expect(service.runMatching(request.id)).resolves.toMatchObject({
      status: 'matched',
      matchCount: 1,
    });
  });

  it('adds a fresh set of records on every run', async () => {
    const request = await seed([buildCarrier(), buildCarrier({ companyName: 'Second' })]);

    await service.runMatching(request.id);
    await requests().update({ id: request.id }, { status: 'new' });
    await service.runMatching(request.id);

    expect(await matches().countBy({ transportRequestId: request.id })).toBe(4);
  });

  it('rejects cargo that does not fit the shipping mode', async () => {
    const request = await seed(
      [buildCarrier()],
      buildTransportRequest({ shippingMode: 'loading_meters', loadingMeters: null }),
    );

    const result = await service.runMatching(request.id);

    expect(result).toEqual({
      status: 'skipped',
      transportRequestId: request.id,
      reason: 'invalid cargo: Loading meters are required in loading_meters mode',
    });
    expect((await requests().findOneBy({ id: request.id }))?.status).toBe('new');
  });

  it('fails loudly on a malformed coverage set', async () => {
    const request = await seed([buildCarrier({ pickupCountries: ['Germany'] })]);

    await expect(service.runMatching(request.id)).rejects.toBeInstanceOf(
      MalformedCoverageError,
    );
    expect(await matches().count()).toBe(0);
    expect((await requests().findOneBy({ id: request.id }))?.status).toBe('new');
  });

  it('hands the request back when storing the matches fails', async () => {
    const request = await seed([buildCarrier()]);
    db.failNextWrite(CarrierRequest, new Error('connection reset'));

    await expect(service.runMatching(request.id)).rejects.toThrow('connection reset');
    expect((await requests().findOneBy({ id: request.id }))?.status).toBe('new');
    expect(jobs.enqueue).not.toHaveBeenCalled();

    await expect(service.runMatching(request.id)).resolves.toMatchObject({
      status: 'matched',
      matchCount: 1,
    });
    expect((await requests().findOneBy({ id: request.id }))?.status).toBe('matching');
  });

  it('throws for an unknown request', async () => {
    await expect(service.runMatching('00000000-0000-0000-0000-000000000000')).rejects.toThrow(
      'Transport request not found',
    );
  });
});
