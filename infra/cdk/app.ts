#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib';
import { WarrantyStack } from './stacks/warranty-stack.js';

const app = new cdk.App();

// Development stack
new WarrantyStack(app, 'WarrantyDevStack', {
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION || 'us-east-1',
  },
  environment: 'dev',
  domainName: process.env.DOMAIN_NAME,
});

// Production stack (deployed via tags)
new WarrantyStack(app, 'WarrantyProdStack', {
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION || 'us-east-1',
  },
  environment: 'prod',
  domainName: process.env.DOMAIN_NAME,
  deleteEvidenceOnRelease: process.env.EVIDENCE_DELETE_ON_RELEASE === 'true',
});

app.synth();
