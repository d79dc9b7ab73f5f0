/**
 * Unit tests for MCP Server Type Definitions
 *
 * @module tests/unit/server/types
 */

import { describe, it, expect } from 'vitest';
import { successResult, type ToolResult } from '../../../src/server/types.js';

describe('successResult', () => {
  it('should wrap data without copying it', () => {
    const data = { city_url: 'https://en.wikipedia.org/wiki/Radom', total: 0 };
    const result = successResult(data);

    expect(result.success).toBe(true);
    expect(result.data).toBe(data);
  });

  it('should narrow a ToolResult on success', () => {
    const result: ToolResult<number> = successResult(3);

    if (result.success) {
      expect(result.data).toBe(3);
    } else {
      throw new Error('expected a success result');
    }
  });
});
