export { ElasticModule } from './elastic.module';
export { ElasticService } from './elastic.service';
export { CAPTURES_INDEX_MAPPING, CAPTURES_INDEX_SETTINGS, IMAGE_FIELDS, MAX_RESULT_WINDOW } from './captures.index';
