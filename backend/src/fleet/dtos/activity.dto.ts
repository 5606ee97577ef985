import { ApiProperty } from '@nestjs/swagger';
import { ActivityReport } from '../types';

export class ActivityDto implements ActivityReport {
  @ApiProperty({ description: 'Action kind', required: false, default: 'unknown' })
  action?: string;

  @ApiProperty({ description: 'Whether the action succeeded', required: false, default: false })
  success?: boolean;

  @ApiProperty({ description: 'Free-form details', required: false, default: '' })
  details?: string;

  @ApiProperty({ description: 'Preview of the posted content, cut to 100 characters', required: false })
  content_preview?: string;
}
