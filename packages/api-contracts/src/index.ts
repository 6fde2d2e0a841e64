export * from './common/pagination.js';
export * from './common/enums.js';
export * from './common/errors.js';
export * from './common/responses.js';

export * from './entities/image.js';

export * from './endpoints/images/params.js';
export * from './endpoints/images/create.js';
export * from './endpoints/images/get.js';
export * from './endpoints/images/list.js';
export * from './endpoints/images/updateStatus.js';
export * from './endpoints/images/updateDetails.js';
export * from './endpoints/images/delete.js';
export * from './endpoints/images/download.js';
