import {
  Controller,
  Get,
  Param,
  ParseUUIDPipe,
  Post,
  SetMetadata,
  UnprocessableEntityException,
} from '@nestjs/common';
import { QuotesService } from './quotes.service';

@Controller('quotes')
export class QuotesController {
  constructor(private readonly quotesService: QuotesService) {}

  @SetMetadata('response_message', 'Quote fetched successfully.')
  @Get(':id')
  findOne(@Param('id', ParseUUIDPipe) id: string) {
    return this.quotesService.findOne(id);
  }

  @SetMetadata('response_message', 'Quote accepted. Carrier matching has been scheduled.')
  @Post(':id/accept')
  accept(@Param('id', ParseUUIDPipe) id: string) {
    return this.quotesService.acceptQuote(id);
  }

  @SetMetadata('response_message', 'Quote declined.')
  @Post(':id/decline')
  decline(@Param('id', ParseUUIDPipe) id: string) {
    return this.quotesService.declineQuote(id);
  }
}

@Controller('transport-requests')
export class TransportRequestQuotesController {
  constructor(private readonly quotesService: QuotesService) {}

  @SetMetadata('response_message', 'Quote fetched successfully.')
  @Get(':id/quote')
  findForRequest(@Param('id', ParseUUIDPipe) id: string) {
    return this.quotesService.findForRequest(id);
  }

  @SetMetadata('response_message', 'Quote calculated successfully.')
  @Post(':id/quote')
  async calculate(@Param('id', ParseUUIDPipe) id: string) {
    const result = await this.quotesService.calculateQuote(id);
    if (result.status === 'rejected') {
      throw new UnprocessableEntityException({
        message: 'Quote could not be calculated',
        errors: result.errors,
      });
    }
    return { quote: result.quote, lineItems: result.lineItems, regenerated: result.regenerated };
  }
}
