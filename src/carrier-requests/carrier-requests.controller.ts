import {
  Body,
  Controller,
  Get,
  Param,
  ParseUUIDPipe,
  Post,
  SetMetadata,
} from '@nestjs/common';
import { CarrierRequestsService } from './carrier-requests.service';
import { SubmitOfferDto } from './dto/submit-offer.dto';

@Controller('carrier-requests')
export class CarrierRequestsController {
  constructor(private readonly carrierRequestsService: CarrierRequestsService) {}

  @SetMetadata('response_message', 'Offer accepted. The carriers will be notified.')
  @Post(':id/accept')
  accept(@Param('id', ParseUUIDPipe) id: string) {
    return this.carrierRequestsService.acceptOffer(id);
  }

  @SetMetadata('response_message', 'Offer rejected.')
  @Post(':id/reject')
  reject(@Param('id', ParseUUIDPipe) id: string) {
    return this.carrierRequestsService.rejectOffer(id);
  }
}

@Controller('offers')
export class OffersController {
  constructor(private readonly carrierRequestsService: CarrierRequestsService) {}

  @SetMetadata('response_message', 'Offer submitted successfully.')
  @Post(':id')
  submit(@Param('id', ParseUUIDPipe) id: string, @Body() submitOfferDto: SubmitOfferDto) {
    return this.carrierRequestsService.submitOffer(id, submitOfferDto);
  }
}

@Controller('transport-requests')
export class TransportRequestOffersController {
  constructor(private readonly carrierRequestsService: CarrierRequestsService) {}

  @SetMetadata('response_message', 'Offers fetched successfully.')
  @Get(':id/offers')
  list(@Param('id', ParseUUIDPipe) id: string) {
    return this.carrierRequestsService.listOffers(id);
  }
}
