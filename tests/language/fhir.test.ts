/**
 * FHIRPath Runtime Tests: FHIR Functions
 * extension(), primitive values, reference resolution, keys, narrative
 */

import { describe, expect, it } from 'vitest';

import { OBSERVATION, PATIENT, run } from '../helpers/runtime.js';

const XHTML = 'http://www.w3.org/1999/xhtml';

const BUNDLE = {
  resourceType: 'Bundle',
  id: 'bundle-1',
  type: 'collection',
  entry: [
    {
      fullUrl: 'urn:uuid:0001',
      resource: { resourceType: 'Patient', id: 'pat-2', name: [{ family: 'Doe' }] },
    },
    {
      fullUrl: 'http://example.org/fhir/Organization/org-1',
      resource: { resourceType: 'Organization', id: 'org-1', name: 'Acme' },
    },
    {
      resource: {
        resourceType: 'Observation',
        id: 'obs-2',
        subject: { reference: 'urn:uuid:0001' },
        performer: [{ reference: 'Organization/org-1' }],
      },
    },
  ],
};

const WITH_CONTAINED = {
  resourceType: 'Observation',
  id: 'obs-3',
  contained: [
    { resourceType: 'Patient', id: 'p1', name: [{ family: 'Inner' }] },
  ],
  subject: { reference: '#p1' },
};

describe('FHIRPath Runtime: FHIR Functions', () => {
  describe('extension()', () => {
    it('reads extensions on a primitive', () => {
      expect(
        run(
          "Patient.birthDate.extension('http://example.org/birth-time').value",
          { resource: PATIENT }
        )
      ).toBe('1974-12-25T14:35:45-05:00');
    });

    it('exposes the primitive element as members', () => {
      expect(run('Patient.birthDate.extension.url', { resource: PATIENT })).toBe(
        'http://example.org/birth-time'
      );
    });

    it('is Empty for an unknown url', () => {
      expect(
        run("Patient.birthDate.extension('http://example.org/none')", {
          resource: PATIENT,
        })
      ).toEqual([]);
    });
  });

  describe('hasValue() / getValue()', () => {
    it('answers for a single primitive', () => {
      const options = { resource: PATIENT };
      expect(run('Patient.birthDate.hasValue()', options)).toBe(true);
      expect(run('Patient.birthDate.getValue()', options)).toBe('1974-12-25');
    });

    it('is false for complex or repeated values', () => {
      const options = { resource: PATIENT };
      expect(run('Patient.name.hasValue()', options)).toBe(false);
      expect(run('Patient.name.given.getValue()', options)).toEqual([]);
    });
  });

  describe('resolve()', () => {
    it('finds another root document', () => {
      expect(
        run('Observation.subject.resolve().id', {
          resources: [PATIENT, OBSERVATION],
        })
      ).toBe('pat-1');
    });

    it('finds a contained resource', () => {
      expect(
        run('Observation.subject.resolve().name.family', {
          resource: WITH_CONTAINED,
        })
      ).toBe('Inner');
    });

    it('finds Bundle entries by fullUrl', () => {
      expect(
        run(
          'Bundle.entry.resource.ofType(Observation).subject.resolve().name.family',
          { resource: BUNDLE }
        )
      ).toBe('Doe');
    });

    it('finds Bundle entries by type and id', () => {
      expect(
        run(
          'Bundle.entry.resource.ofType(Observation).performer.resolve().name',
          { resource: BUNDLE }
        )
      ).toBe('Acme');
    });

    it('is Empty when nothing matches', () => {
      expect(
        run('Patient.managingOrganization.resolve()', { resource: PATIENT })
      ).toEqual([]);
    });
  });

  describe('getReferenceKey() / getResourceKey()', () => {
    it('extracts the id of a reference', () => {
      const options = { resource: OBSERVATION };
      expect(run('Observation.subject.getReferenceKey()', options)).toBe(
        'pat-1'
      );
      expect(run('Observation.subject.getReferenceKey(Patient)', options)).toBe(
        'pat-1'
      );
      expect(
        run('Observation.subject.getReferenceKey(Organization)', options)
      ).toEqual([]);
    });

    it('extracts the id of a resource', () => {
      expect(run('Patient.getResourceKey()', { resource: PATIENT })).toBe(
        'pat-1'
      );
    });
  });

  describe('htmlChecks()', () => {
    it('accepts simple narrative', () => {
      expect(
        run(`'<div xmlns="${XHTML}"><p>Hello</p></div>'.htmlChecks()`)
      ).toBe(true);
    });

    it('rejects a script element', () => {
      expect(
        run(`'<div xmlns="${XHTML}"><script>x</script></div>'.htmlChecks()`)
      ).toBe(false);
    });

    it('requires the XHTML namespace', () => {
      expect(run(`'<div><p>Hello</p></div>'.htmlChecks()`)).toBe(false);
    });

    it('requires some content', () => {
      expect(run(`'<div xmlns="${XHTML}"></div>'.htmlChecks()`)).toBe(false);
    });

    it('checks narrative in a document', () => {
      const resource = {
        resourceType: 'Patient',
        id: 'pat-3',
        text: {
          status: 'generated',
          div: `<div xmlns="${XHTML}"><b>Jane</b> Doe</div>`,
        },
      };
      expect(run('Patient.text.div.htmlChecks()', { resource })).toBe(true);
    });
  });
});
