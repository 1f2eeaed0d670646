import React from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import { craneUnloadingDynProg } from '../../src/algorithms/DynProg';
import { AgreementBanner, ResultPanel } from '../../src/components/ResultPanel';
import type { SolverResult } from '../../src/interfaces/interfaces';
import { parseGrid } from '../../src/utils/textMap/textMap';

describe('ResultPanel', () => {
  const path = craneUnloadingDynProg(parseGrid('c.\n.c'));
  const result: SolverResult = {
    algo: 'DynProg',
    path,
    cranes: path.totalCranes(),
    steps: path.stepCount(),
    runtimeMs: 2.5,
  };

  describe('Scenario: finished run', () => {
    const html = renderToStaticMarkup(
      <ResultPanel algo="DynProg" result={result} skipped={false}>
        <canvas width={10} height={10} />
      </ResultPanel>
    );
    it('shows the algorithm and status', () => {
      // Assert
      expect(html).toContain('<h2>DynProg</h2><div class="status">Done</div>');
    });
    it('shows the crane count', () => {
      // Assert
      expect(html).toContain('<div class="label">Cranes</div><div class="value">2</div>');
    });
    it('shows the runtime in milliseconds', () => {
      // Assert
      expect(html).toContain('<div class="value">2.5 ms</div>');
    });
    it('shows the end cell', () => {
      // Assert
      expect(html).toContain('<div class="label">End cell</div><div class="value">(1,1)</div>');
    });
    it('renders its children', () => {
      // Assert
      expect(html).toContain('<canvas width="10" height="10"></canvas>');
    });
  });

  describe('Scenario: skipped run', () => {
    const html = renderToStaticMarkup(
      <ResultPanel algo="Exhaustive" result={null} skipped={true} />
    );
    it('shows the skipped status', () => {
      // Assert
      expect(html).toContain('<div class="status">Skipped</div>');
    });
    it('leaves the stats blank', () => {
      // Assert
      expect(html).toContain('<div class="label">Steps</div><div class="value">—</div>');
    });
  });
});

describe('AgreementBanner', () => {
  it('says when only one solver ran', () => {
    // Act
    const html = renderToStaticMarkup(<AgreementBanner agree={null} />);
    // Assert
    expect(html).toBe('<div class="banner">Only the dynamic-programming solver ran.</div>');
  });
  it('confirms matching counts', () => {
    // Act
    const html = renderToStaticMarkup(<AgreementBanner agree={true} />);
    // Assert
    expect(html).toBe('<div class="banner ok">Both solvers found the same crane count.</div>');
  });
  it('flags a mismatch', () => {
    // Act
    const html = renderToStaticMarkup(<AgreementBanner agree={false} />);
    // Assert
    expect(html).toBe('<div class="banner mismatch">Crane counts differ!</div>');
  });
});
