export { DirectLinkResolver } from './DirectLinkResolver';
