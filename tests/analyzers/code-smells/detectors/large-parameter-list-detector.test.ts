/**
 * Large Parameter List Detector Tests
 */

import { describe, it, expect } from 'vitest';
import { LargeParameterListDetector } from '../../../../src/analyzers/code-smells/detectors/large-parameter-list-detector.js';
import { SmellSeverity } from '../../../../src/analyzers/code-smells/types.js';
import { SourceModelBuilder } from '../../../../src/analyzers/ast/parser.js';

const builder = new SourceModelBuilder();

const params = (count: number): string => Array.from({ length: count }, (_, i) => `p${i}: number`).join(', ');

describe('LargeParameterListDetector', () => {
  const detector = new LargeParameterListDetector();

  it('should report a function with more parameters than allowed', () => {
    const smells = detector.detect(builder.build(`function create(${params(6)}) {}`));

    expect(smells).toHaveLength(1);
    expect(smells[0].severity).toBe(SmellSeverity.MEDIUM);
    expect(smells[0].message).toBe("Function 'create' has 6 parameters (threshold: 5)");
    expect(smells[0].metrics).toEqual({ paramCount: 6, maxParameters: 5 });
  });

  it('should not count the implicit receiver', () => {
    const unit = builder.build(`class Shape {\n  resize(${params(5)}) {}\n}`);
    expect(unit.classes[0].methods[0].parameters).toHaveLength(6);
    expect(detector.detect(unit)).toEqual([]);
  });

  it('should report HIGH above twice the threshold', () => {
    const [smell] = detector.detect(builder.build(`function create(${params(11)}) {}`));
    expect(smell.severity).toBe(SmellSeverity.HIGH);
  });

  it('should keep MEDIUM at exactly twice the threshold', () => {
    const [smell] = detector.detect(builder.build(`function create(${params(10)}) {}`));
    expect(smell.severity).toBe(SmellSeverity.MEDIUM);
  });
});
