import { ApiProperty } from '@nestjs/swagger';

export class TicketAcceptedDto {
  @ApiProperty({ example: '0b9f7c56-2f43-4c1a-9d0e-3a8f7b6c5d4e', format: 'uuid' })
  ticket_id: string;

  constructor(ticketId: string) {
    this.ticket_id = ticketId;
  }
}
