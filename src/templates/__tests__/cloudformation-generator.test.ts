import { describe, it, expect } from 'vitest';
import { CloudFormationGenerator, PHASE1_OUTPUTS, PHASE2_OUTPUTS } from '../cloudformation-generator.js';

describe('CloudFormationGenerator', () => {
  const generator = new CloudFormationGenerator();

  describe('phase 1', () => {
    const template = generator.generate(1);

    it('should contain only the hosted zone', () => {
      expect(Object.keys(template.Resources)).toEqual(['HostedZone']);
      expect(template.Resources.HostedZone.Type).toBe('AWS::Route53::HostedZone');
      expect(template.Resources.HostedZone.Properties?.Name).toEqual({ Ref: 'DomainName' });
    });

    it('should take the domain as its only parameter', () => {
      expect(Object.keys(template.Parameters ?? {})).toEqual(['DomainName']);
    });

    it('should output the nameservers as a comma separated list', () => {
      expect(template.Outputs?.[PHASE1_OUTPUTS.nameServers].Value).toEqual({
        'Fn::Join': [', ', { 'Fn::GetAtt': ['HostedZone', 'NameServers'] }]
      });
    });

    it('should export the hosted zone id for phase 2', () => {
      expect(template.Outputs?.[PHASE1_OUTPUTS.hostedZoneId]).toEqual({
        Description: 'Route 53 hosted zone id',
        Value: { Ref: 'HostedZone' },
        Export: { Name: { 'Fn::Sub': '${AWS::StackName}-HostedZoneId' } }
      });
    });
  });

  describe('phase 2', () => {
    const template = generator.generate(2);

    it('should declare the site resources', () => {
      const types = Object.fromEntries(
        Object.entries(template.Resources).map(([name, resource]) => [name, resource.Type])
      );

      expect(types).toEqual({
        S3Bucket: 'AWS::S3::Bucket',
        S3BucketWww: 'AWS::S3::Bucket',
        OriginAccessControl: 'AWS::CloudFront::OriginAccessControl',
        SSLCertificate: 'AWS::CertificateManager::Certificate',
        CloudFrontDistribution: 'AWS::CloudFront::Distribution',
        S3BucketPolicy: 'AWS::S3::BucketPolicy',
        DNSRecord: 'AWS::Route53::RecordSetGroup'
      });
    });

    it('should import the hosted zone from the phase 1 stack', () => {
      expect(Object.keys(template.Parameters ?? {})).toEqual(['DomainName', 'Phase1StackName']);
      expect(template.Resources.DNSRecord.Properties?.HostedZoneId).toEqual({
        'Fn::ImportValue': { 'Fn::Sub': '${Phase1StackName}-HostedZoneId' }
      });
    });

    it('should validate the certificate through DNS for both names', () => {
      const properties = template.Resources.SSLCertificate.Properties;
      expect(properties?.ValidationMethod).toBe('DNS');
      expect(properties?.SubjectAlternativeNames).toEqual([{ 'Fn::Sub': 'www.${DomainName}' }]);
    });

    it('should grant read access to the distribution only', () => {
      const policy = template.Resources.S3BucketPolicy.Properties?.PolicyDocument;
      expect(policy).toMatchObject({
        Statement: [
          {
            Principal: { Service: 'cloudfront.amazonaws.com' },
            Action: 's3:GetObject',
            Resource: { 'Fn::Sub': 'arn:aws:s3:::${S3Bucket}/*' }
          }
        ]
      });
    });

    it('should expose the outputs the deployer reads', () => {
      expect(Object.keys(template.Outputs ?? {})).toEqual(Object.values(PHASE2_OUTPUTS));
    });
  });
});
