export { downsamplePoints } from './downsample';
