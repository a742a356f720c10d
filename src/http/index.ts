export {
  tracingMiddleware,
  instrumentIncomingRequests,
  getRequestContext,
  type RequestLike,
  type ResponseLike,
} from './middleware.js';
