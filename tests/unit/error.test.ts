import { z } from 'zod';
import {
  DeviceNotFoundError,
  SubprocessError,
  UnsupportedOperationError,
  ValidationError,
} from '../../src/types';
import { ToolCallError, classifyError, formatErrorForResponse, toToolCallError } from '../../src/utils/error';

describe('Error Utilities', () => {
  describe('formatErrorForResponse', () => {
    it('should append the suggestion when there is one', () => {
      const error = new DeviceNotFoundError('emulator-5556', 'android');

      expect(formatErrorForResponse(error)).toBe(
        "Device with ID 'emulator-5556' not found on android\n\n" +
          'Suggestion: Call list_available_devices to see the connected devices and their IDs'
      );
    });

    it('should use the plain message otherwise', () => {
      expect(formatErrorForResponse(new ValidationError('text must not be empty'))).toBe('text must not be empty');
      expect(formatErrorForResponse(new Error('boom'))).toBe('boom');
      expect(formatErrorForResponse('oops')).toBe('oops');
    });
  });

  describe('classifyError', () => {
    it('should keep the kind of domain errors', () => {
      expect(classifyError(new UnsupportedOperationError('get_orientation', 'ios', 'simulator')).kind).toBe(
        'platform_unsupported'
      );
      expect(classifyError(new SubprocessError('adb devices -l', 'exit status 1')).kind).toBe('subprocess');
    });

    it('should treat schema failures as validation errors', () => {
      let caught: unknown;
      try {
        z.object({ x: z.number() }).parse({});
      } catch (error) {
        caught = error;
      }

      expect(classifyError(caught)).toEqual({ kind: 'validation', message: 'Invalid arguments: x: Required' });
    });

    it('should treat failed system calls as IO errors', () => {
      const error = Object.assign(new Error("EACCES: permission denied, open '/root/shot.png'"), {
        code: 'EACCES',
        syscall: 'open',
      });

      expect(classifyError(error)).toEqual({
        kind: 'io',
        message: "EACCES: permission denied, open '/root/shot.png'",
      });
    });

    it('should treat anything else as internal', () => {
      expect(classifyError(new TypeError('Cannot read properties of undefined'))).toEqual({
        kind: 'internal',
        message: 'Cannot read properties of undefined',
      });
    });
  });

  describe('toToolCallError', () => {
    it('should carry the numeric code, the message and the tool', () => {
      const mapped = toToolCallError(new DeviceNotFoundError('missing', 'auto'), 'take_screenshot');

      expect(mapped).toBeInstanceOf(ToolCallError);
      expect(mapped.code).toBe(-32001);
      expect(mapped.message).toBe(
        "Device with ID 'missing' not found on any platform\n\n" +
          'Suggestion: Call list_available_devices to see the connected devices and their IDs'
      );
      expect(mapped.data).toEqual({ kind: 'device', tool: 'take_screenshot' });
    });

    it.each([
      [new ValidationError('bad'), -32602],
      [new UnsupportedOperationError('get_orientation', 'ios', 'simulator'), -32002],
      [new SubprocessError('xcrun simctl io x tap 1 1', 'exit status 1'), -32003],
      [new Error('unexpected'), -32603],
    ])('should map %s to code %d', (error, code) => {
      expect(toToolCallError(error, 'tool').code).toBe(code);
    });
  });
});
