/**
 * Re-exports all typed exception classes.
 *
 * @example
 * ```typescript
 * import { TicketValidationException } from '../../common/exceptions';
 * ```
 */

export * from './domain.exceptions';
