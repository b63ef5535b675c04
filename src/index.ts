export * from './api_types';
export * from './errors';
export { normalize } from './params';
export { getSetCookieHeaders, parseSetCookies, serializeCookies, mergeCookies, updateCookie } from './cookies';
export { recursiveMerge, getPath, freezeTree } from './merge';
export { HttpTransport, TransportOptions, AxiosTransport, validateApiUrl } from './transport';
export { Session, Initializer } from './Session';
export { ContinuationStream, continueParams } from './stream';
