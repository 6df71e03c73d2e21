import { BadRequestException, Injectable, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CaptureRepository, CaptureSummary, MAX_RESULT_WINDOW, StoredImage, toSummary } from '../../libs/common';

export type ImageKind = 'raw' | 'annotated';

export interface CaptureListing {
  page: number;
  page_size: number;
  total: number;
  total_pages: number;
  items: CaptureSummary[];
}

@Injectable()
export class CapturesService {
  constructor(
    private readonly configService: ConfigService,
    private readonly captureRepository: CaptureRepository,
  ) {}

  async list(page = 1, pageSize?: number): Promise<CaptureListing> {
    const size = pageSize ?? this.configService.get<number>('dashboard.defaultPageSize', 50);
    if (page * size > MAX_RESULT_WINDOW) {
      throw new BadRequestException(
        `Only the ${MAX_RESULT_WINDOW} most recent captures can be paged through; page ${page} of size ${size} is past that`,
      );
    }
    const { total, items } = await this.captureRepository.list(page, size);
    return {
      page,
      page_size: size,
      total,
      total_pages: Math.max(1, Math.ceil(total / size)),
      items,
    };
  }

  async findOne(id: string): Promise<CaptureSummary> {
    const record = await this.captureRepository.findById(id);
    if (!record) {
      throw new NotFoundException('Capture not found');
    }
    return toSummary(record);
  }

  async getImage(id: string, kind: ImageKind): Promise<StoredImage> {
    const record = await this.captureRepository.findById(id);
    const image = kind === 'raw' ? record?.raw_image : record?.annotated_image;
    if (!image) {
      throw new NotFoundException(kind === 'raw' ? 'Image not found' : 'Annotated image not found');
    }
    return image;
  }
}
