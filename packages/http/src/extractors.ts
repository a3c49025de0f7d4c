import type {Extractor} from './handler';
import type {HttpVersion} from './request';
import {ok} from './result';

export const bodyBytes: Extractor<Buffer> = ({request}) => ok(request.body);

export const requestVersion: Extractor<HttpVersion> = ({request}) => ok(request.version);
