export * from './types.js';
export { DefaultStacIO, S3StacIO, parseS3Uri, type StacIO, type S3Location, type S3StacIOOptions } from './io.js';
export { StacCatalog, readStacObject, resolveHref, type LocatedItem } from './catalog.js';
