import * as cdk from 'aws-cdk-lib';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as apigateway from 'aws-cdk-lib/aws-apigatewayv2';
import * as apigatewayIntegrations from 'aws-cdk-lib/aws-apigatewayv2-integrations';
import * as apigatewayAuthorizers from 'aws-cdk-lib/aws-apigatewayv2-authorizers';
import * as cognito from 'aws-cdk-lib/aws-cognito';
import * as logs from 'aws-cdk-lib/aws-logs';
import { Construct } from 'constructs';

export interface WarrantyStackProps extends cdk.StackProps {
  environment: 'dev' | 'prod';
  domainName?: string;
  deleteEvidenceOnRelease?: boolean;
}

export class WarrantyStack extends cdk.Stack {
  constructor(scope: Construct, id: string, props: WarrantyStackProps) {
    super(scope, id, props);

    const { environment, domainName } = props;
    const prefix = `warranty-${environment}`;
    const removalPolicy = environment === 'prod'
      ? cdk.RemovalPolicy.RETAIN
      : cdk.RemovalPolicy.DESTROY;

    // Require domainName for production to ensure CORS is properly configured
    if (environment === 'prod' && !domainName) {
      throw new Error('domainName is required for production deployments to configure CORS');
    }

    const corsOrigins: string[] = [];
    if (environment === 'dev') {
      corsOrigins.push('http://localhost:5173');
      corsOrigins.push('http://localhost:3000');
    }
    if (domainName) {
      corsOrigins.push(`https://${domainName}`);
      if (domainName.startsWith('www.')) {
        corsOrigins.push(`https://${domainName.slice(4)}`);
      } else {
        corsOrigins.push(`https://www.${domainName}`);
      }
    }

    // ============================================================
    // S3 Buckets
    // ============================================================

    // Proof-of-purchase files; only reached through presigned downloads
    const evidenceBucket = new s3.Bucket(this, 'EvidenceBucket', {
      bucketName: `${prefix}-evidence-${this.account}`,
      versioned: true,
      encryption: s3.BucketEncryption.S3_MANAGED,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      enforceSSL: true,
      removalPolicy,
      autoDeleteObjects: environment !== 'prod',
    });

    // ============================================================
    // DynamoDB Tables
    // ============================================================

    // Serial ledger: one item per serial number
    const serialsTable = new dynamodb.Table(this, 'SerialsTable', {
      tableName: `${prefix}-serials`,
      partitionKey: { name: 'PK', type: dynamodb.AttributeType.STRING },
      sortKey: { name: 'SK', type: dynamodb.AttributeType.STRING },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      pointInTimeRecoverySpecification: { pointInTimeRecoveryEnabled: true },
      removalPolicy,
    });

    // Serials by product
    serialsTable.addGlobalSecondaryIndex({
      indexName: 'GSI1',
      partitionKey: { name: 'GSI1PK', type: dynamodb.AttributeType.STRING },
      sortKey: { name: 'GSI1SK', type: dynamodb.AttributeType.STRING },
    });

    // Serials by owner, sparse
    serialsTable.addGlobalSecondaryIndex({
      indexName: 'GSI2',
      partitionKey: { name: 'GSI2PK', type: dynamodb.AttributeType.STRING },
      sortKey: { name: 'GSI2SK', type: dynamodb.AttributeType.STRING },
    });

    const productsTable = new dynamodb.Table(this, 'ProductsTable', {
      tableName: `${prefix}-products`,
      partitionKey: { name: 'PK', type: dynamodb.AttributeType.STRING },
      sortKey: { name: 'SK', type: dynamodb.AttributeType.STRING },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      pointInTimeRecoverySpecification: { pointInTimeRecoveryEnabled: true },
      removalPolicy,
    });

    productsTable.addGlobalSecondaryIndex({
      indexName: 'GSI1',
      partitionKey: { name: 'GSI1PK', type: dynamodb.AttributeType.STRING },
      sortKey: { name: 'GSI1SK', type: dynamodb.AttributeType.STRING },
    });

    // Account status, maintained by the user directory
    const usersTable = new dynamodb.Table(this, 'UsersTable', {
      tableName: `${prefix}-users`,
      partitionKey: { name: 'PK', type: dynamodb.AttributeType.STRING },
      sortKey: { name: 'SK', type: dynamodb.AttributeType.STRING },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      pointInTimeRecoverySpecification: { pointInTimeRecoveryEnabled: true },
      removalPolicy,
    });

    const auditTable = new dynamodb.Table(this, 'AuditTable', {
      tableName: `${prefix}-audit`,
      partitionKey: { name: 'PK', type: dynamodb.AttributeType.STRING },
      sortKey: { name: 'SK', type: dynamodb.AttributeType.STRING },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      pointInTimeRecoverySpecification: { pointInTimeRecoveryEnabled: true },
      removalPolicy,
    });

    // Entries by actor
    auditTable.addGlobalSecondaryIndex({
      indexName: 'GSI1',
      partitionKey: { name: 'GSI1PK', type: dynamodb.AttributeType.STRING },
      sortKey: { name: 'GSI1SK', type: dynamodb.AttributeType.STRING },
    });

    // Entries by target
    auditTable.addGlobalSecondaryIndex({
      indexName: 'GSI2',
      partitionKey: { name: 'GSI2PK', type: dynamodb.AttributeType.STRING },
      sortKey: { name: 'GSI2SK', type: dynamodb.AttributeType.STRING },
    });

    // ============================================================
    // Cognito User Pool
    // ============================================================
    const userPool = new cognito.UserPool(this, 'UserPool', {
      userPoolName: `${prefix}-users`,
      selfSignUpEnabled: true,
      signInAliases: {
        email: true,
      },
      standardAttributes: {
        email: {
          required: true,
          mutable: false,
        },
      },
      passwordPolicy: {
        minLength: 12,
        requireLowercase: true,
        requireUppercase: true,
        requireDigits: true,
        requireSymbols: true,
      },
      accountRecovery: cognito.AccountRecovery.EMAIL_ONLY,
      removalPolicy,
    });

    // Admin group - users must be in this group to access /admin/* routes
    new cognito.CfnUserPoolGroup(this, 'AdminGroup', {
      userPoolId: userPool.userPoolId,
      groupName: 'admin',
      description: 'Administrators who manage products, serial uploads and registrations',
    });

    const userPoolClient = userPool.addClient('WebClient', {
      userPoolClientName: `${prefix}-web-client`,
      authFlows: {
        userPassword: true,
        userSrp: true,
      },
      generateSecret: false,
      accessTokenValidity: cdk.Duration.hours(1),
      idTokenValidity: cdk.Duration.hours(1),
      refreshTokenValidity: cdk.Duration.days(30),
    });

    // ============================================================
    // Lambda Function
    // ============================================================
    const apiLogGroup = new logs.LogGroup(this, 'ApiLogGroup', {
      logGroupName: `/aws/lambda/${prefix}-api`,
      retention: logs.RetentionDays.THREE_MONTHS,
      removalPolicy,
    });

    const apiFunction = new lambda.Function(this, 'ApiFunction', {
      functionName: `${prefix}-api`,
      runtime: lambda.Runtime.NODEJS_20_X,
      handler: 'handlers/api.handler',
      code: lambda.Code.fromAsset('../../backend/dist'),
      memorySize: 512,
      timeout: cdk.Duration.seconds(30),
      logGroup: apiLogGroup,
      environment: {
        NODE_ENV: environment,
        AWS_NODEJS_CONNECTION_REUSE_ENABLED: '1',
        SERIALS_TABLE: serialsTable.tableName,
        PRODUCTS_TABLE: productsTable.tableName,
        USERS_TABLE: usersTable.tableName,
        AUDIT_TABLE: auditTable.tableName,
        EVIDENCE_BUCKET: evidenceBucket.bucketName,
        EVIDENCE_DELETE_ON_RELEASE: String(props.deleteEvidenceOnRelease ?? false),
        LOG_LEVEL: environment === 'prod' ? 'info' : 'debug',
      },
    });

    // Grant permissions
    serialsTable.grantReadWriteData(apiFunction);
    productsTable.grantReadWriteData(apiFunction);
    usersTable.grantReadData(apiFunction);
    auditTable.grantReadWriteData(apiFunction);
    evidenceBucket.grantReadWrite(apiFunction);
    evidenceBucket.grantDelete(apiFunction);

    // ============================================================
    // API Gateway
    // ============================================================
    const httpApi = new apigateway.HttpApi(this, 'HttpApi', {
      apiName: `${prefix}-api`,
      corsPreflight: corsOrigins.length > 0
        ? {
            allowOrigins: corsOrigins,
            allowMethods: [
              apigateway.CorsHttpMethod.GET,
              apigateway.CorsHttpMethod.POST,
              apigateway.CorsHttpMethod.PUT,
              apigateway.CorsHttpMethod.DELETE,
              apigateway.CorsHttpMethod.OPTIONS,
            ],
            allowHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
            exposeHeaders: ['Retry-After'],
            maxAge: cdk.Duration.minutes(10),
          }
        : undefined,
    });

    const jwtAuthorizer = new apigatewayAuthorizers.HttpJwtAuthorizer(
      'JwtAuthorizer',
      `https://cognito-idp.${this.region}.amazonaws.com/${userPool.userPoolId}`,
      {
        jwtAudience: [userPoolClient.userPoolClientId],
      }
    );

    const lambdaIntegration = new apigatewayIntegrations.HttpLambdaIntegration(
      'LambdaIntegration',
      apiFunction
    );

    // Public routes
    httpApi.addRoutes({
      path: '/health',
      methods: [apigateway.HttpMethod.GET],
      integration: lambdaIntegration,
    });

    httpApi.addRoutes({
      path: '/serials/{serialNumber}',
      methods: [apigateway.HttpMethod.GET],
      integration: lambdaIntegration,
    });

    // Customer routes (with JWT auth)
    httpApi.addRoutes({
      path: '/me/{proxy+}',
      methods: [apigateway.HttpMethod.GET, apigateway.HttpMethod.POST],
      integration: lambdaIntegration,
      authorizer: jwtAuthorizer,
    });

    // Admin routes (with JWT auth; group checked in the handler)
    httpApi.addRoutes({
      path: '/admin/{proxy+}',
      methods: [
        apigateway.HttpMethod.GET,
        apigateway.HttpMethod.POST,
        apigateway.HttpMethod.PUT,
        apigateway.HttpMethod.DELETE,
      ],
      integration: lambdaIntegration,
      authorizer: jwtAuthorizer,
    });

    // ============================================================
    // Outputs
    // ============================================================
    new cdk.CfnOutput(this, 'ApiUrl', {
      value: httpApi.url || '',
      description: 'API Gateway URL',
    });

    new cdk.CfnOutput(this, 'UserPoolId', {
      value: userPool.userPoolId,
      description: 'Cognito User Pool ID',
    });

    new cdk.CfnOutput(this, 'UserPoolClientId', {
      value: userPoolClient.userPoolClientId,
      description: 'Cognito User Pool Client ID',
    });

    new cdk.CfnOutput(this, 'EvidenceBucketName', {
      value: evidenceBucket.bucketName,
      description: 'Proof-of-purchase S3 Bucket',
    });
  }
}
