import { BadRequestException, Injectable } from '@nestjs/common';
import { JsonObject } from '../../domain/billing/models';
import { logger } from '../logger/logger.config';

@Injectable()
export class PayloadValidatorService {
  private readonly logger = logger();
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  isValidPayloadStructure(payload: unknown): payload is JsonObject {
    return (
      typeof payload === 'object' && payload !== null && !Array.isArray(payload)
    );
  }

  /**
   * Decodes raw webhook bytes as a UTF-8 JSON object
   */
  decodeJsonObject(raw: Buffer): JsonObject {
    let payload: unknown;
    try {
      payload = JSON.parse(this.decoder.decode(raw));
    } catch (error: unknown) {
      this.logger.warn(
        {
          bytes: raw.length,
          error: error instanceof Error ? error.message : String(error),
        },
        'Invalid JSON payload',
      );
      throw new BadRequestException('Invalid JSON payload.');
    }

    if (!this.isValidPayloadStructure(payload)) {
      this.logger.warn({ bytes: raw.length }, 'Invalid payload structure');
      throw new BadRequestException('Invalid payload structure');
    }

    return payload;
  }
}
