export { dispatch, toJson, type ApiRequest, type ApiResponse } from './routes';
export { startApiServer } from './server';
