/** Injection token for the clock used to stamp intake and processing times. */
export const TICKET_CLOCK = 'TICKET_CLOCK';

/** Injection token for the ticket id generator. */
export const TICKET_ID_GENERATOR = 'TICKET_ID_GENERATOR';

export type Clock = () => Date;
export type IdGenerator = () => string;
