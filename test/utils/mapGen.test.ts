import { generateEmpty, generateGrid, generateRandom } from '../../src/utils/mapGen/mapGen';
import { renderGrid } from '../../src/utils/textMap/textMap';

describe('mapGen', () => {
  describe('generateEmpty()', () => {
    it('creates a grid of empty cells', () => {
      // Act
      const grid = generateEmpty(2, 3);
      // Assert
      expect(renderGrid(grid)).toBe('...\n...');
    });
  });

  describe('generateRandom()', () => {
    it('draws one number per cell in row-major order', () => {
      // Act
      const grid = generateRandom({
        rows: 2,
        columns: 2,
        craneDensity: 0.3,
        buildingDensity: 0.3,
        seed: 1,
      });
      // Assert
      expect(renderGrid(grid)).toBe('.c\nc.');
    });
    it('never puts a building on the start cell', () => {
      // Act
      const grid = generateRandom({
        rows: 3,
        columns: 3,
        craneDensity: 0,
        buildingDensity: 1,
        seed: 5,
      });
      // Assert
      expect(renderGrid(grid)).toBe('.XX\nXXX\nXXX');
    });
    it('fills every cell with a crane at full crane density', () => {
      // Act
      const grid = generateRandom({
        rows: 3,
        columns: 4,
        craneDensity: 1,
        buildingDensity: 0,
        seed: 9,
      });
      // Assert
      expect(grid.craneCount()).toBe(12);
    });
    it('is deterministic for a seed', () => {
      // Arrange
      const options = { rows: 5, columns: 5, craneDensity: 0.3, buildingDensity: 0.2, seed: 77 };
      // Act & Assert
      expect(renderGrid(generateRandom(options))).toBe(renderGrid(generateRandom(options)));
    });
    it('treats seed 0 like seed 1', () => {
      // Arrange
      const options = { rows: 4, columns: 4, craneDensity: 0.3, buildingDensity: 0.2 };
      // Act & Assert
      expect(renderGrid(generateRandom({ ...options, seed: 0 }))).toBe(
        renderGrid(generateRandom({ ...options, seed: 1 }))
      );
    });
    it('rejects a density outside [0, 1]', () => {
      // Act & Assert
      expect(() =>
        generateRandom({ rows: 2, columns: 2, craneDensity: 1.5, buildingDensity: 0, seed: 1 })
      ).toThrow('Density 1.5 is outside [0, 1].');
    });
    it('rejects densities adding up to more than 1', () => {
      // Act & Assert
      expect(() =>
        generateRandom({ rows: 2, columns: 2, craneDensity: 0.6, buildingDensity: 0.6, seed: 1 })
      ).toThrow(RangeError);
    });
  });

  describe('generateGrid()', () => {
    it('ignores densities for an empty map', () => {
      // Act
      const grid = generateGrid({
        rows: 1,
        columns: 3,
        mapType: 'Empty',
        craneDensity: 1,
        buildingDensity: 0,
        seed: 3,
      });
      // Assert
      expect(renderGrid(grid)).toBe('...');
    });
    it('generates a random map from the config', () => {
      // Act
      const grid = generateGrid({
        rows: 2,
        columns: 2,
        mapType: 'Random',
        craneDensity: 0.3,
        buildingDensity: 0.3,
        seed: 1,
      });
      // Assert
      expect(renderGrid(grid)).toBe('.c\nc.');
    });
  });
});
