import { z } from 'zod';
import { parseRecordTime } from '../common/utils/date-utils';

const numericField = z.string().trim().min(1).pipe(z.coerce.number().finite());

/**
 * One row of the persisted alert log as read by csv-parser (all strings)
 */
export const AlertLogRowSchema = z
  .object({
    Satellite: z.string().trim().min(1),
    Time: z.string().refine((value) => parseRecordTime(value) !== null, {
      message: 'expected "YYYY-MM-DD HH:MM:SS"',
    }),
    S4C: numericField,
    Lat: numericField,
    Lon: numericField,
  })
  .strict();
