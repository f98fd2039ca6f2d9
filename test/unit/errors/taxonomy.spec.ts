/**
 * Error taxonomy tests
 */

import { describe, it } from 'mocha';
import { expect } from 'chai';

import {
  AllocationError,
  ErrorCategory,
  ErrorCodeRegistry,
  ErrorSeverity,
  ReadinessError,
  SpotkubeError,
  StateError,
  TeardownError,
  extractErrorDetails,
  isSpotkubeError,
  renderMessage
} from '../../../src/errors';
import { SPOTKUBE_ERROR_CODES } from '../../../src/core/errors/codes';

describe('Error taxonomy', () => {

  describe('Error codes', () => {

    it('should register every spotkube error code', () => {
      for (const errorCode of Object.values(SPOTKUBE_ERROR_CODES)) {
        expect(ErrorCodeRegistry.get(errorCode.code)).to.deep.equal(errorCode);
      }
    });

    it('should use unique codes', () => {
      const codes = Object.values(SPOTKUBE_ERROR_CODES).map(c => c.code);
      expect(new Set(codes).size).to.equal(codes.length);
    });
  });

  describe('Messages', () => {

    it('should render context placeholders', () => {
      expect(renderMessage('Host {host} unreachable after {timeoutSeconds}s', { host: '203.0.113.1', timeoutSeconds: 300 }))
        .to.equal('Host 203.0.113.1 unreachable after 300s');
    });

    it('should join arrays and keep unknown placeholders', () => {
      expect(renderMessage('{ids} / {missing}', { ids: ['i-1', 'i-2'] })).to.equal('i-1, i-2 / {missing}');
    });

    it('should name offending host in readiness errors', () => {
      const error = new ReadinessError(SPOTKUBE_ERROR_CODES.NODE_UNREACHABLE, { host: '203.0.113.7', timeoutSeconds: 300 });
      expect(error.message).to.equal('Host 203.0.113.7 not reachable over SSH after 300s');
    });

    it('should name spot request and node in allocation errors', () => {
      const error = new AllocationError(
        SPOTKUBE_ERROR_CODES.SPOT_REQUEST_FAILED,
        { spotRequestId: 'sir-1', nodeName: 'demo-k8s-main', status: 'price-too-low' }
      );

      expect(error.message).to.equal('Spot request sir-1 for demo-k8s-main failed: price-too-low');
      expect(error.category).to.equal(ErrorCategory.ALLOCATION);
    });
  });

  describe('Error classes', () => {

    it('should expose code metadata and context', () => {
      const error = new StateError(SPOTKUBE_ERROR_CODES.CLUSTER_NOT_FOUND, { clusterName: 'demo' });

      expect(error).to.be.instanceOf(SpotkubeError);
      expect(error).to.be.instanceOf(Error);
      expect(error.name).to.equal('StateError');
      expect(error.code).to.equal('SK_CLUSTER_NOT_FOUND');
      expect(error.category).to.equal(ErrorCategory.STATE);
      expect(error.severity).to.equal(ErrorSeverity.CRITICAL);
      expect(error.context).to.deep.equal({ clusterName: 'demo' });
    });

    it('should recognize spotkube errors only', () => {
      expect(isSpotkubeError(new StateError(SPOTKUBE_ERROR_CODES.CLUSTER_NOT_FOUND, { clusterName: 'demo' }))).to.equal(true);
      expect(isSpotkubeError(new Error('plain'))).to.equal(false);
      expect(isSpotkubeError('just a string')).to.equal(false);
    });

    it('should serialize with original error message', () => {
      const original = new Error('UnauthorizedOperation');
      const error = new TeardownError(SPOTKUBE_ERROR_CODES.TERMINATE_FAILED, { instanceIds: ['i-1'], reason: 'denied' }, original);
      const serialized = error.toJSON();

      expect(serialized.code).to.equal('SK_TERMINATE_FAILED');
      expect(serialized.message).to.equal('Failed to terminate instances i-1: denied');
      expect(serialized.originalError).to.equal('UnauthorizedOperation');
      expect(serialized.context).to.deep.equal({ instanceIds: ['i-1'], reason: 'denied' });
    });
  });

  describe('Error details', () => {

    it('should include suggestions of registered code', () => {
      const error = new ReadinessError(SPOTKUBE_ERROR_CODES.NODE_UNREACHABLE, { host: '203.0.113.7', timeoutSeconds: 300 });
      const details = extractErrorDetails(error);

      expect(details.code).to.equal('SK_NODE_UNREACHABLE');
      expect(details.suggestions).to.deep.equal(['Check allowed_ingress covers your address', 'Run create again to resume']);
    });

    it('should handle plain errors and other values', () => {
      expect(extractErrorDetails(new Error('plain')).message).to.equal('plain');
      expect(extractErrorDetails(42)).to.deep.equal({ message: '42', context: {} });
    });
  });
});
