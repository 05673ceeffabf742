/**
 * Reasons Registry
 * Re-exports the machine-parsable codes so consumers of this package need no direct dto import.
 */
import { REASONS as DTO_REASONS, ReasonCode, ReasonDetail } from '@sealkeeper/dto'

export const REASONS: Record<ReasonCode, ReasonDetail> = DTO_REASONS

export type { ReasonDetail }
