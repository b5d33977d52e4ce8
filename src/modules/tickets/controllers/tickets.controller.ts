import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiAcceptedResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { ApiErrorResponses } from '../../../common/decorators/api-error-responses.decorator';
import { MalformedRequestException } from '../../../common/exceptions';
import { CreateTicketDto, toTicketRequest } from '../dto/create-ticket.dto';
import { TicketAcceptedDto } from '../dto/ticket-accepted.dto';
import { TicketIntakeService } from '../services/ticket-intake.service';

@ApiTags('Tickets')
@ApiErrorResponses('BAD_REQUEST', 'UNPROCESSABLE_ENTITY', 'SERVICE_UNAVAILABLE', 'INTERNAL_SERVER_ERROR')
@Controller('tickets')
export class TicketsController {
  constructor(private readonly intakeService: TicketIntakeService) {}

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({
    summary: 'Open a warranty exchange ticket',
    description: 'Validates the request and queues it. The outcome is sent to the requester once processed.',
  })
  @ApiAcceptedResponse({ type: TicketAcceptedDto })
  async create(@Body() dto: CreateTicketDto): Promise<TicketAcceptedDto> {
    // the body parser lets arrays through
    if (!(dto instanceof CreateTicketDto)) {
      throw new MalformedRequestException();
    }
    const ticketId = await this.intakeService.submit(toTicketRequest(dto));
    return new TicketAcceptedDto(ticketId);
  }
}
