/**
 * @format
 * DatabaseStack Unit Tests
 */

import { Environment } from '../../../lib/config';
import { DatabaseOutput } from '../../../lib/stacks/contract';
import {
    createThreeTierApp,
    importValueOf,
    Match,
    StackAssertions,
    TEST_PREFIX,
} from '../../fixtures';

describe('DatabaseStack', () => {
    const { templates } = createThreeTierApp();
    const template = templates.database;

    describe('Parameters', () => {
        it('should take the network stack name, defaulting to the derived name', () => {
            template.hasParameter('NetworkStackName', {
                Type: 'String',
                Default: `${TEST_PREFIX}-network`,
                AllowedPattern: '^[a-zA-Z][-a-zA-Z0-9]*$',
            });
        });
    });

    describe('Database Instance', () => {
        it('should create a single MySQL 8.0 instance', () => {
            template.resourceCountIs('AWS::RDS::DBInstance', 1);
            template.hasResourceProperties('AWS::RDS::DBInstance', {
                Engine: 'mysql',
                EngineVersion: '8.0',
                DBInstanceClass: 'db.t3.micro',
                DBName: 'appdb',
            });
        });

        it('should keep the database private and encrypted', () => {
            template.hasResourceProperties('AWS::RDS::DBInstance', {
                PubliclyAccessible: false,
                StorageEncrypted: true,
                StorageType: 'gp3',
            });
        });

        it('should apply development sizing', () => {
            template.hasResourceProperties('AWS::RDS::DBInstance', {
                AllocatedStorage: '20',
                MaxAllocatedStorage: 50,
                MultiAZ: false,
                BackupRetentionPeriod: 1,
                DeletionProtection: false,
                DeleteAutomatedBackups: true,
            });
        });

        it('should be deleted with the stack outside production', () => {
            template.hasResource('AWS::RDS::DBInstance', {
                DeletionPolicy: 'Delete',
                UpdateReplacePolicy: 'Delete',
            });
        });

        it('should place the instance in the imported database subnets', () => {
            template.hasResourceProperties('AWS::RDS::DBSubnetGroup', {
                SubnetIds: [
                    importValueOf('NetworkStackName', 'DBSubnet1'),
                    importValueOf('NetworkStackName', 'DBSubnet2'),
                ],
            });
        });

        it('should use the imported database security group', () => {
            template.hasResourceProperties('AWS::RDS::DBInstance', {
                VPCSecurityGroups: [importValueOf('NetworkStackName', 'DatabaseSecurityGroup')],
            });
            template.resourceCountIs('AWS::EC2::SecurityGroup', 0);
        });
    });

    describe('Credentials', () => {
        it('should generate master credentials in Secrets Manager', () => {
            template.resourceCountIs('AWS::SecretsManager::Secret', 1);
            template.hasResourceProperties('AWS::SecretsManager::Secret', {
                GenerateSecretString: Match.objectLike({
                    SecretStringTemplate: '{"username":"admin"}',
                    GenerateStringKey: 'password',
                }),
            });
        });

        it('should not fix the secret name', () => {
            template.hasResourceProperties('AWS::SecretsManager::Secret', {
                Name: Match.absent(),
            });
        });
    });

    describe('Production', () => {
        const { templates: prod } = createThreeTierApp({ environment: Environment.PRODUCTION });

        it('should run multi-AZ and stay deletable by the stack', () => {
            prod.database.hasResourceProperties('AWS::RDS::DBInstance', {
                MultiAZ: true,
                DeletionProtection: false,
                BackupRetentionPeriod: 14,
                DBInstanceClass: 'db.t3.small',
            });
        });

        it('should snapshot the instance on delete', () => {
            prod.database.hasResource('AWS::RDS::DBInstance', {
                DeletionPolicy: 'Snapshot',
                UpdateReplacePolicy: 'Snapshot',
            });
        });
    });

    describe('Outputs', () => {
        it('should export every database output', () => {
            Object.values(DatabaseOutput).forEach(key => StackAssertions.hasExportedOutput(template, key));
        });

        it('should export the database name as a literal', () => {
            template.hasOutput('DBName', { Value: 'appdb' });
        });
    });
});
