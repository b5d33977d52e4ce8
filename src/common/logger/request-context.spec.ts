import { getCorrelationId, getRequestContext, runWithContext } from './request-context';

describe('request-context', () => {
  it('should be empty outside a context', () => {
    expect(getRequestContext()).toBeUndefined();
    expect(getCorrelationId()).toBeUndefined();
  });

  it('should expose the context to async work started inside it', async () => {
    const seen = await runWithContext({ correlationId: 'corr-1', ticketId: 'ticket-1' }, async () => {
      await Promise.resolve();
      return getRequestContext();
    });

    expect(seen).toEqual({ correlationId: 'corr-1', ticketId: 'ticket-1' });
    expect(getRequestContext()).toBeUndefined();
  });
});
