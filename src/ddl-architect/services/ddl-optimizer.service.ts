import { Injectable } from '@nestjs/common';
import {
  GENERAL_OPTIMIZATION_NOTE,
  OPTIMIZATION_NOTES,
} from '../constants/optimization-notes';
import { toUsageType } from './performance-estimator.service';

@Injectable()
export class DdlOptimizerService {
  optimize(ddlText: string, usageType: string): string {
    const known = toUsageType(usageType);
    const note = known ? OPTIMIZATION_NOTES[known] : GENERAL_OPTIMIZATION_NOTE;

    return `${ddlText}\n-- OPTIMIZATION FOR ${usageType.toUpperCase()}:\n-- ${note}\n`;
  }
}
