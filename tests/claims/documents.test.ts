import { describe, it, expect } from 'vitest';
import {
  CHECKLISTS,
  checklistFor,
  dedupeDocuments,
  inferIncidentTypes,
  partitionByDeclaration,
  partitionChecklist,
} from '../../src/claims/documents.js';

describe('inferIncidentTypes', () => {
  it('should detect a single incident type', () => {
    expect(inferIncidentTypes('The truck collided with my fence post')).toEqual(['auto']);
  });

  it('should return every matching type in canonical order', () => {
    expect(
      inferIncidentTypes('After the fire I was hospitalized and later died of my injuries')
    ).toEqual(['death', 'medical', 'property']);
  });

  it('should fall back to general', () => {
    expect(inferIncidentTypes('My luggage went missing at the airport')).toEqual(['general']);
  });
});

describe('checklistFor', () => {
  it('should merge checklists without repeating shared documents', () => {
    expect(checklistFor(['auto', 'property'])).toEqual([
      'Police Report',
      'Repair/Replacement Estimate',
      'Photographs of Damage',
      "Driver's Licence Copy",
      'Police/Fire Report',
    ]);
  });

  it('should use the general checklist for general incidents', () => {
    expect(checklistFor(['general'])).toEqual(CHECKLISTS.general);
  });
});

describe('dedupeDocuments', () => {
  it('should keep the first spelling and drop blanks', () => {
    expect(dedupeDocuments(['Police Report', ' police report ', '', 'Photos'])).toEqual([
      'Police Report',
      'Photos',
    ]);
  });
});

describe('partitionChecklist', () => {
  const checklist = ['A', 'B', 'C', 'D'];

  it('should prefer the least favourable bucket', () => {
    expect(
      partitionChecklist(checklist, {
        verified: ['a', 'b', 'c'],
        unverified: ['b', 'c'],
        missing: ['c'],
      })
    ).toEqual({ verified: ['A'], unverified: ['B'], missing: ['C', 'D'] });
  });

  it('should ignore classifications for documents outside the checklist', () => {
    expect(
      partitionChecklist(['A'], { verified: ['A', 'Z'], unverified: [], missing: ['Y'] })
    ).toEqual({ verified: ['A'], unverified: [], missing: [] });
  });
});

describe('partitionByDeclaration', () => {
  it('should mark declared documents unverified and the rest missing', () => {
    expect(partitionByDeclaration(['Receipt', 'Photo'], ['receipt'])).toEqual({
      verified: [],
      unverified: ['Receipt'],
      missing: ['Photo'],
    });
  });
});
