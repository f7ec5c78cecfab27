import { describe, it, expect } from 'vitest';
import { validateSettings, validateAndNormalizeSettings } from '../validator';

describe('Settings Validator', () => {
  describe('validateSettings', () => {
    it('should validate a complete settings object', () => {
      const settings = {
        aws: {
          region: 'eu-west-1'
        },
        provisioning: {
          wait_timeout_seconds: 600,
          enforce_subnet_containment: false,
          tags: {
            Project: 'network',
            Environment: 'staging'
          }
        }
      };

      const result = validateSettings(settings);
      expect(result.valid).toBe(true);
      expect(result.errors).toHaveLength(0);
    });

    it('should accept an empty or missing settings object', () => {
      expect(validateSettings({}).valid).toBe(true);
      expect(validateSettings(undefined).valid).toBe(true);
      expect(validateSettings(null).valid).toBe(true);
    });

    it('should report every invalid field', () => {
      const settings = {
        aws: {
          region: 'US_EAST'
        },
        provisioning: {
          wait_timeout_seconds: 0
        },
        extra: true
      };

      const result = validateSettings(settings);
      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        'AWS region must be a valid region identifier (e.g., us-east-1)',
        'Wait timeout must be at least 16 seconds (the VPC waiter polls every 15 seconds)',
        '"extra" is not allowed'
      ]);
    });

    it('should reject a wait timeout the VPC waiter cannot honour', () => {
      expect(validateSettings({ provisioning: { wait_timeout_seconds: 15 } }).errors).toEqual([
        'Wait timeout must be at least 16 seconds (the VPC waiter polls every 15 seconds)'
      ]);
      expect(validateSettings({ provisioning: { wait_timeout_seconds: 16 } }).valid).toBe(true);
    });

    it('should reject a wait timeout above one hour', () => {
      const result = validateSettings({ provisioning: { wait_timeout_seconds: 3601 } });
      expect(result.errors).toEqual(['Wait timeout must be no more than 3600 seconds (1 hour)']);
    });

    it('should reject a non-boolean containment flag', () => {
      const result = validateSettings({ provisioning: { enforce_subnet_containment: 'sometimes' } });
      expect(result.errors).toEqual(['Enforce subnet containment must be a boolean value']);
    });

    it('should reject tag values longer than EC2 allows', () => {
      const result = validateSettings({ provisioning: { tags: { Project: 'x'.repeat(257) } } });
      expect(result.errors).toEqual(['Tag values must be no more than 256 characters long']);
    });

    it('should reject tag keys with the aws: prefix', () => {
      const result = validateSettings({ provisioning: { tags: { 'aws:team': 'core' } } });
      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(['"provisioning.tags.aws:team" is not allowed']);
    });
  });

  describe('validateAndNormalizeSettings', () => {
    it('should fill in defaults', () => {
      expect(validateAndNormalizeSettings({})).toEqual({
        aws: { region: 'us-east-1' },
        provisioning: {
          wait_timeout_seconds: 300,
          enforce_subnet_containment: true,
          tags: {}
        }
      });
    });

    it('should keep provided values and default the rest', () => {
      const settings = validateAndNormalizeSettings({
        provisioning: { wait_timeout_seconds: '45', tags: { Team: 'net' } }
      });

      expect(settings.aws.region).toBe('us-east-1');
      expect(settings.provisioning.wait_timeout_seconds).toBe(45);
      expect(settings.provisioning.enforce_subnet_containment).toBe(true);
      expect(settings.provisioning.tags).toEqual({ Team: 'net' });
    });

    it('should throw with all validation errors', () => {
      expect(() => validateAndNormalizeSettings({ aws: { region: 'nowhere' } })).toThrow(
        'Settings validation failed:\nAWS region must be a valid region identifier (e.g., us-east-1)'
      );
    });
  });
});
