/**
 * Raw event sources
 */

export * from './types';
export * from './event-queue';
export * from './push-source';
export * from './pull-source';
export * from './decode';
export * from './ws-source';
