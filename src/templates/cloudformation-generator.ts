import { CloudFormationTemplate, TemplateGenerator } from './types.js';
import { PhaseId } from '../types/index.js';

// Fixed hosted zone id for every CloudFront alias target
const CLOUDFRONT_HOSTED_ZONE_ID = 'Z2FDTNDATAQYW2';
// Managed policies: CachingOptimized and CORS-S3Origin
const CACHING_OPTIMIZED_POLICY_ID = '658327ea-f89d-4fab-a63d-7e88639e58f6';
const CORS_S3_ORIGIN_POLICY_ID = '88a5eaf4-2fd4-4709-b370-b4c650ea3fcf';

export const PHASE1_OUTPUTS = {
  hostedZoneId: 'HostedZoneId',
  nameServers: 'NameServers'
} as const;

export const PHASE2_OUTPUTS = {
  websiteUrl: 'WebsiteURL',
  bucketName: 'BucketName',
  bucketSecureUrl: 'S3BucketSecureURL',
  distributionId: 'CloudFrontDistributionId',
  distributionDomainName: 'CloudFrontDomainName',
  certificateArn: 'SSLCertificateArn'
} as const;

/**
 * Phase 1 holds only the hosted zone, so the operator can delegate the domain
 * before anything that needs DNS validation exists. Phase 2 imports the zone
 * id through the Phase 1 export.
 */
export class CloudFormationGenerator implements TemplateGenerator {
  generate(phaseId: PhaseId): CloudFormationTemplate {
    return phaseId === 1 ? this.createPhase1Template() : this.createPhase2Template();
  }

  private createPhase1Template(): CloudFormationTemplate {
    return {
      AWSTemplateFormatVersion: '2010-09-09',
      Description: 'Static website hosting, phase 1: Route 53 hosted zone',
      Parameters: {
        DomainName: this.domainNameParameter()
      },
      Resources: {
        HostedZone: {
          Type: 'AWS::Route53::HostedZone',
          Properties: {
            Name: { Ref: 'DomainName' },
            HostedZoneConfig: {
              Comment: { 'Fn::Sub': 'Hosted zone for ${DomainName}' }
            }
          }
        }
      },
      Outputs: {
        [PHASE1_OUTPUTS.hostedZoneId]: {
          Description: 'Route 53 hosted zone id',
          Value: { Ref: 'HostedZone' },
          Export: { Name: { 'Fn::Sub': '${AWS::StackName}-HostedZoneId' } }
        },
        [PHASE1_OUTPUTS.nameServers]: {
          Description: 'Name servers for the hosted zone',
          Value: { 'Fn::Join': [', ', { 'Fn::GetAtt': ['HostedZone', 'NameServers'] }] }
        }
      }
    };
  }

  private createPhase2Template(): CloudFormationTemplate {
    const hostedZoneId = { 'Fn::ImportValue': { 'Fn::Sub': '${Phase1StackName}-HostedZoneId' } };
    const wwwDomain = { 'Fn::Sub': 'www.${DomainName}' };

    return {
      AWSTemplateFormatVersion: '2010-09-09',
      Description: 'Static website hosting, phase 2: S3, CloudFront, ACM certificate and DNS records',
      Parameters: {
        DomainName: this.domainNameParameter(),
        Phase1StackName: {
          Type: 'String',
          Description: 'Name of the phase 1 stack that exports the hosted zone id'
        }
      },
      Resources: {
        S3Bucket: {
          Type: 'AWS::S3::Bucket',
          Properties: {
            BucketName: { Ref: 'DomainName' },
            PublicAccessBlockConfiguration: this.blockAllPublicAccess(),
            BucketEncryption: {
              ServerSideEncryptionConfiguration: [
                { ServerSideEncryptionByDefault: { SSEAlgorithm: 'AES256' } }
              ]
            },
            VersioningConfiguration: { Status: 'Enabled' }
          }
        },
        S3BucketWww: {
          Type: 'AWS::S3::Bucket',
          Properties: {
            BucketName: wwwDomain,
            PublicAccessBlockConfiguration: this.blockAllPublicAccess(),
            WebsiteConfiguration: {
              RedirectAllRequestsTo: { HostName: { Ref: 'DomainName' }, Protocol: 'https' }
            }
          }
        },
        OriginAccessControl: {
          Type: 'AWS::CloudFront::OriginAccessControl',
          Properties: {
            OriginAccessControlConfig: {
              Name: { 'Fn::Sub': '${DomainName}-OAC' },
              OriginAccessControlOriginType: 's3',
              SigningBehavior: 'always',
              SigningProtocol: 'sigv4'
            }
          }
        },
        SSLCertificate: {
          Type: 'AWS::CertificateManager::Certificate',
          Properties: {
            DomainName: { Ref: 'DomainName' },
            SubjectAlternativeNames: [wwwDomain],
            ValidationMethod: 'DNS',
            DomainValidationOptions: [
              { DomainName: { Ref: 'DomainName' }, HostedZoneId: hostedZoneId },
              { DomainName: wwwDomain, HostedZoneId: hostedZoneId }
            ]
          }
        },
        CloudFrontDistribution: {
          Type: 'AWS::CloudFront::Distribution',
          Properties: {
            DistributionConfig: {
              Enabled: true,
              HttpVersion: 'http2',
              DefaultRootObject: 'index.html',
              PriceClass: 'PriceClass_100',
              Aliases: [{ Ref: 'DomainName' }, wwwDomain],
              Origins: [
                {
                  Id: 'S3Origin',
                  DomainName: { 'Fn::GetAtt': ['S3Bucket', 'RegionalDomainName'] },
                  S3OriginConfig: { OriginAccessIdentity: '' },
                  OriginAccessControlId: { 'Fn::GetAtt': ['OriginAccessControl', 'Id'] }
                }
              ],
              DefaultCacheBehavior: {
                TargetOriginId: 'S3Origin',
                ViewerProtocolPolicy: 'redirect-to-https',
                AllowedMethods: ['GET', 'HEAD', 'OPTIONS'],
                CachedMethods: ['GET', 'HEAD'],
                Compress: true,
                CachePolicyId: CACHING_OPTIMIZED_POLICY_ID,
                OriginRequestPolicyId: CORS_S3_ORIGIN_POLICY_ID
              },
              ViewerCertificate: {
                AcmCertificateArn: { Ref: 'SSLCertificate' },
                SslSupportMethod: 'sni-only',
                MinimumProtocolVersion: 'TLSv1.2_2021'
              },
              CustomErrorResponses: [
                { ErrorCode: 403, ResponseCode: 200, ResponsePagePath: '/index.html' },
                { ErrorCode: 404, ResponseCode: 200, ResponsePagePath: '/index.html' }
              ]
            }
          }
        },
        S3BucketPolicy: {
          Type: 'AWS::S3::BucketPolicy',
          Properties: {
            Bucket: { Ref: 'S3Bucket' },
            PolicyDocument: {
              Version: '2012-10-17',
              Statement: [
                {
                  Sid: 'AllowCloudFrontServicePrincipal',
                  Effect: 'Allow',
                  Principal: { Service: 'cloudfront.amazonaws.com' },
                  Action: 's3:GetObject',
                  Resource: { 'Fn::Sub': 'arn:aws:s3:::${S3Bucket}/*' },
                  Condition: {
                    StringEquals: {
                      'AWS:SourceArn': {
                        'Fn::Sub': 'arn:aws:cloudfront::${AWS::AccountId}:distribution/${CloudFrontDistribution}'
                      }
                    }
                  }
                }
              ]
            }
          }
        },
        DNSRecord: {
          Type: 'AWS::Route53::RecordSetGroup',
          Properties: {
            HostedZoneId: hostedZoneId,
            RecordSets: [
              this.aliasRecord({ Ref: 'DomainName' }),
              this.aliasRecord(wwwDomain)
            ]
          }
        }
      },
      Outputs: {
        [PHASE2_OUTPUTS.websiteUrl]: {
          Description: 'URL of the website',
          Value: { 'Fn::Sub': 'https://${DomainName}' }
        },
        [PHASE2_OUTPUTS.bucketName]: {
          Description: 'Bucket holding the website content',
          Value: { Ref: 'S3Bucket' }
        },
        [PHASE2_OUTPUTS.bucketSecureUrl]: {
          Description: 'Secure URL of the content bucket',
          Value: { 'Fn::Sub': 'https://${S3Bucket.DomainName}' }
        },
        [PHASE2_OUTPUTS.distributionId]: {
          Description: 'CloudFront distribution id',
          Value: { Ref: 'CloudFrontDistribution' }
        },
        [PHASE2_OUTPUTS.distributionDomainName]: {
          Description: 'CloudFront distribution domain name',
          Value: { 'Fn::GetAtt': ['CloudFrontDistribution', 'DomainName'] }
        },
        [PHASE2_OUTPUTS.certificateArn]: {
          Description: 'ACM certificate ARN',
          Value: { Ref: 'SSLCertificate' }
        }
      }
    };
  }

  private domainNameParameter() {
    return {
      Type: 'String',
      Description: 'Domain name for the website',
      AllowedPattern: '^[a-zA-Z0-9.-]{1,253}$',
      ConstraintDescription: 'must be a valid domain name.'
    };
  }

  private blockAllPublicAccess() {
    return {
      BlockPublicAcls: true,
      BlockPublicPolicy: true,
      IgnorePublicAcls: true,
      RestrictPublicBuckets: true
    };
  }

  private aliasRecord(name: { Ref: string } | { 'Fn::Sub': string }) {
    return {
      Name: name,
      Type: 'A',
      AliasTarget: {
        DNSName: { 'Fn::GetAtt': ['CloudFrontDistribution', 'DomainName'] },
        HostedZoneId: CLOUDFRONT_HOSTED_ZONE_ID
      }
    };
  }
}
