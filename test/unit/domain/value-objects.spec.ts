import { describe, it, expect } from 'vitest';
import { DownloadUriVO } from '../../../src/domain/value-objects/download-uri.vo';
import { ServiceState, ServiceStateVO } from '../../../src/domain/value-objects/service-state.vo';
import { isUploadBackendId } from '../../../src/domain/value-objects/upload-backend-id.vo';
import { ValidationError } from '../../../src/domain/errors/relay.errors';

describe('Value objects', () => {
  describe('DownloadUriVO', () => {
    it.each([
      ['http://example.com/a.iso', 'http'],
      ['HTTPS://example.com/a.iso', 'https'],
      ['ftp://mirror.example.org/a.tar', 'ftp'],
      ['sftp://host/a.tar', 'sftp'],
      ['magnet:?xt=urn:btih:c12fe1c06bba254a9dc9f519b335aa7c1367a88a&dn=demo', 'magnet'],
    ])('should accept %s as %s', (raw, scheme) => {
      expect(DownloadUriVO.create(raw).scheme).toBe(scheme);
    });

    it('should trim surrounding whitespace', () => {
      expect(DownloadUriVO.create('  http://example.com/a  ').value).toBe('http://example.com/a');
    });

    it.each(['', 'file:///etc/passwd', 'http://exa mple.com', 'magnet:?dn=no-hash', 'javascript:alert(1)'])(
      'should reject %j',
      (raw) => {
        expect(() => DownloadUriVO.create(raw)).toThrow(ValidationError);
      },
    );

    it('should reject overly long URIs', () => {
      expect(() => DownloadUriVO.create(`http://example.com/${'a'.repeat(8200)}`)).toThrow(
        'Download URI exceeds 8192 characters',
      );
    });

    it('should recognize magnets', () => {
      expect(DownloadUriVO.create('magnet:?xt=urn:btih:abc').isMagnet()).toBe(true);
      expect(DownloadUriVO.create('http://example.com').isMagnet()).toBe(false);
    });
  });

  describe('ServiceStateVO', () => {
    const state = (value: ServiceState) => ServiceStateVO.of(value);

    it('should allow the normal lifecycle', () => {
      expect(state(ServiceState.NOT_INSTALLED).canTransitionTo(state(ServiceState.STOPPED))).toBe(true);
      expect(state(ServiceState.STOPPED).canTransitionTo(state(ServiceState.STARTING))).toBe(true);
      expect(state(ServiceState.STARTING).canTransitionTo(state(ServiceState.RUNNING))).toBe(true);
      expect(state(ServiceState.RUNNING).canTransitionTo(state(ServiceState.STOPPING))).toBe(true);
      expect(state(ServiceState.STOPPING).canTransitionTo(state(ServiceState.STOPPED))).toBe(true);
      expect(state(ServiceState.FAILED).canTransitionTo(state(ServiceState.STARTING))).toBe(true);
    });

    it('should refuse shortcuts', () => {
      expect(state(ServiceState.NOT_INSTALLED).canTransitionTo(state(ServiceState.RUNNING))).toBe(false);
      expect(state(ServiceState.RUNNING).canTransitionTo(state(ServiceState.NOT_INSTALLED))).toBe(false);
      expect(state(ServiceState.STOPPED).canTransitionTo(state(ServiceState.RUNNING))).toBe(false);
    });

    it('should answer lifecycle questions', () => {
      expect(state(ServiceState.STARTING).isBusy()).toBe(true);
      expect(state(ServiceState.RUNNING).isBusy()).toBe(false);
      expect(ServiceStateVO.notInstalled().isInstalled()).toBe(false);
      expect(state(ServiceState.FAILED).canStart()).toBe(true);
      expect(state(ServiceState.RUNNING).canStart()).toBe(false);
    });
  });

  describe('isUploadBackendId', () => {
    it('should accept known backends only', () => {
      expect(isUploadBackendId('telegram')).toBe(true);
      expect(isUploadBackendId('dropbox')).toBe(false);
    });
  });
});
