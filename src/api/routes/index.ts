export { registerPipelineRoutes } from './pipeline';
export { registerPapersRoutes } from './papers';
