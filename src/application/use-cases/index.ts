export { ProcessVideoUseCase } from './process-video.use-case';
