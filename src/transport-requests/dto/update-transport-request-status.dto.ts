import { IsIn, IsNotEmpty } from 'class-validator';

export const PROGRESS_STATUSES = ['in_transit', 'delivered'] as const;

export type ProgressStatus = (typeof PROGRESS_STATUSES)[number];

export class UpdateTransportRequestStatusDto {
  @IsIn(PROGRESS_STATUSES)
  @IsNotEmpty()
  status!: ProgressStatus;
}
