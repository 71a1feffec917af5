import {
  Body,
  Controller,
  Delete,
  Get,
  Inject,
  Param,
  Post,
  ServiceUnavailableException,
} from '@nestjs/common';
import { UploadSchema } from '../ai/schemas';
import { APP_CONFIG, type AppConfig } from '../config/app.config';
import { IngestService } from './ingest.service';

@Controller('documents')
export class IngestController {
  constructor(
    private readonly ingest: IngestService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  private ensureDev() {
    if (!this.config.devMode) {
      throw new ServiceUnavailableException('DEV_MODE is off.');
    }
  }

  @Post()
  async upload(@Body() body: unknown) {
    const input = UploadSchema.parse(body);
    return this.ingest.uploadDocument({
      documentId: input.documentId,
      title: input.title,
      contentType: input.contentType,
      bytes: Buffer.from(input.content, input.encoding),
    });
  }

  @Get(':id')
  get(@Param('id') id: string) {
    return this.ingest.getDocument(id);
  }

  @Delete(':id')
  async remove(@Param('id') id: string) {
    this.ensureDev();
    return this.ingest.deleteDocument(id);
  }

  @Post(':id/clear-halt')
  clearHalt(@Param('id') id: string) {
    this.ensureDev();
    return this.ingest.clearHalt(id);
  }
}
