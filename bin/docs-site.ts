#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib/core';
import { DocsSiteStack } from '../lib/docs-site-stack.js';

const app = new cdk.App();

function contextString(key: string, fallback: string): string {
  const value: unknown = app.node.tryGetContext(key);
  return typeof value === 'string' && value !== '' ? value : fallback;
}

const project = contextString('project', 'hla-compass');
const environment = contextString('environment', process.env.ENVIRONMENT ?? 'dev');

new DocsSiteStack(app, `DocsSite-${environment}`, {
  project,
  environment,
  resolverConfig: {
    defaultDocument: 'index.html',
  },
});
