import { expect } from 'chai';
import { describe, it } from 'mocha';
import {
  parseAccelerators,
  parseMetadata,
  sanitizeFilePath,
  sanitizeJobName,
  sanitizeProjectId,
  sanitizeSSHHost,
  sanitizeSSHUsername,
  sanitizeZone,
  ValidationError,
} from '../lib/sanitization';

describe('sanitization', () => {
  describe('sanitizeJobName', () => {
    it('should trim valid names', () => {
      expect(sanitizeJobName(' t1 ')).to.equal('t1');
    });

    it('should reject uppercase letters', () => {
      expect(() => sanitizeJobName('T1')).to.throw(
        ValidationError,
        'Job name must start with a lowercase letter'
      );
    });

    it('should reject names longer than 63 characters', () => {
      expect(() => sanitizeJobName('a'.repeat(64))).to.throw(
        ValidationError,
        'Job name cannot exceed 63 characters'
      );
    });

    it('should reject a trailing hyphen', () => {
      expect(() => sanitizeJobName('t1-')).to.throw(ValidationError);
    });
  });

  describe('sanitizeProjectId', () => {
    it('should accept project ids', () => {
      expect(sanitizeProjectId('proj-a')).to.equal('proj-a');
    });

    it('should reject short ids', () => {
      expect(() => sanitizeProjectId('ab')).to.throw(
        ValidationError,
        'Invalid project id: ab'
      );
    });
  });

  describe('sanitizeZone', () => {
    it('should accept zones', () => {
      expect(sanitizeZone('us-east1-c')).to.equal('us-east1-c');
    });

    it('should reject regions', () => {
      expect(() => sanitizeZone('us-east1')).to.throw(
        ValidationError,
        'Invalid zone: us-east1'
      );
    });
  });

  describe('parseAccelerators', () => {
    it('should map labels to counts', () => {
      expect(parseAccelerators(['nvidia-tesla-k80=2'])).to.deep.equal({
        'nvidia-tesla-k80': 2,
      });
    });

    it('should require label=count', () => {
      expect(() => parseAccelerators(['nvidia-tesla-k80'])).to.throw(
        ValidationError,
        'Accelerator must be given as name=value'
      );
    });

    it('should reject a count of zero', () => {
      expect(() => parseAccelerators(['nvidia-tesla-k80=0'])).to.throw(
        ValidationError,
        'Accelerator count for nvidia-tesla-k80 must be between 1 and 16'
      );
    });
  });

  describe('parseMetadata', () => {
    it('should split on the first equals sign', () => {
      expect(parseMetadata(['query=a=b'])).to.deep.equal([
        { key: 'query', value: 'a=b' },
      ]);
    });

    it('should reject reserved keys', () => {
      expect(() => parseMetadata(['startup-script=echo hi'])).to.throw(
        ValidationError,
        'Metadata key startup-script is managed by flint'
      );
    });
  });

  describe('sanitizeFilePath', () => {
    it('should resolve relative paths against the base directory', () => {
      expect(sanitizeFilePath('run.sh', 'script', '/jobs')).to.equal(
        '/jobs/run.sh'
      );
    });

    it('should reject blank paths', () => {
      expect(() => sanitizeFilePath('  ', 'script')).to.throw(
        ValidationError,
        'script cannot be empty'
      );
    });
  });

  describe('sanitizeSSHHost', () => {
    it('should reject shell characters', () => {
      expect(() => sanitizeSSHHost('host;rm')).to.throw(
        ValidationError,
        'SSH host must be a valid hostname or IP address'
      );
    });
  });

  describe('sanitizeSSHUsername', () => {
    it('should reject root', () => {
      expect(() => sanitizeSSHUsername('root')).to.throw(
        ValidationError,
        'root cannot be used'
      );
    });

    it('should accept unix usernames', () => {
      expect(sanitizeSSHUsername('flint')).to.equal('flint');
    });
  });
});
