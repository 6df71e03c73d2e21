import { Controller, Get, Param, Query, StreamableFile } from '@nestjs/common';
import { CapturesService } from './captures.service';
import { ListCapturesQueryDto } from './dto/list-captures.query.dto';

@Controller('captures')
export class CapturesController {
  constructor(private readonly capturesService: CapturesService) {}

  @Get()
  async list(@Query() query: ListCapturesQueryDto) {
    return this.capturesService.list(query.page ?? 1, query.page_size);
  }

  @Get(':id')
  async findOne(@Param('id') id: string) {
    return this.capturesService.findOne(id);
  }

  @Get(':id/image')
  async image(@Param('id') id: string): Promise<StreamableFile> {
    const image = await this.capturesService.getImage(id, 'raw');
    return new StreamableFile(image.data, { type: image.mime_type });
  }

  @Get(':id/annotated')
  async annotated(@Param('id') id: string): Promise<StreamableFile> {
    const image = await this.capturesService.getImage(id, 'annotated');
    return new StreamableFile(image.data, { type: image.mime_type });
  }
}
