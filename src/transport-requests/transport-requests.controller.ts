import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  SetMetadata,
} from '@nestjs/common';
import { UpdateTransportRequestStatusDto } from './dto/update-transport-request-status.dto';
import { TransportRequestsService } from './transport-requests.service';

@Controller('transport-requests')
export class TransportRequestsController {
  constructor(private readonly transportRequestsService: TransportRequestsService) {}

  @SetMetadata('response_message', 'Transport request fetched successfully.')
  @Get(':id')
  findOne(@Param('id', ParseUUIDPipe) id: string) {
    return this.transportRequestsService.findOne(id);
  }

  @SetMetadata('response_message', 'Carrier matching has been scheduled.')
  @HttpCode(HttpStatus.ACCEPTED)
  @Post(':id/matching')
  requestMatching(@Param('id', ParseUUIDPipe) id: string) {
    return this.transportRequestsService.requestMatching(id);
  }

  @SetMetadata('response_message', 'Transport request cancelled.')
  @Post(':id/cancel')
  cancel(@Param('id', ParseUUIDPipe) id: string) {
    return this.transportRequestsService.cancel(id);
  }

  @SetMetadata('response_message', 'Transport request status updated successfully.')
  @Patch(':id/status')
  updateStatus(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() updateStatusDto: UpdateTransportRequestStatusDto,
  ) {
    return this.transportRequestsService.updateStatus(id, updateStatusDto.status);
  }
}
