/**
 * Inference Engine Tests
 */

import type { Section } from '../../processing/processing.types';
import { InferenceEngine } from '../inference.engine';
import { Candidate, PageForest } from '../inference.types';

const USERS_URL = 'https://docs.example.com/users';
const ACCOUNTS_URL = 'https://docs.example.com/accounts';

function section(
  title: string,
  level: number,
  bodyText: string = '',
  children: Section[] = [],
  sourceUrl: string = USERS_URL
): Section {
  return { title, level, bodyText, children, sourceUrl };
}

describe('InferenceEngine', () => {
  let engine: InferenceEngine;

  beforeEach(() => {
    engine = new InferenceEngine({ similarityThreshold: 0.8 });
  });

  describe('infer', () => {
    it('should merge near-identical module titles across pages', () => {
      const forests: PageForest[] = [
        {
          sourceUrl: USERS_URL,
          sections: [
            section(
              'User Management',
              1,
              'Create and manage user accounts. Assign roles to every member of a workspace.',
              [
                section('Inviting Users', 3, 'Send an invitation email to a new teammate.'),
                section('Removing Users', 3),
              ]
            ),
          ],
        },
        {
          sourceUrl: ACCOUNTS_URL,
          sections: [
            section('user managment', 2, 'Accounts can be suspended by an administrator.', [], ACCOUNTS_URL),
          ],
        },
      ];

      const modules = engine.infer(forests);

      expect(modules).toEqual([
        {
          name: 'User Management',
          description:
            'Create and manage user accounts. Assign roles to every member of a workspace. ' +
            'Accounts can be suspended by an administrator.',
          confidence: 0.9,
          sourceUrls: [USERS_URL, ACCOUNTS_URL],
          submodules: [
            {
              name: 'Inviting Users',
              description: 'Send an invitation email to a new teammate.',
              confidence: 0.58,
              sourceUrls: [USERS_URL],
            },
            {
              name: 'Removing Users',
              description: 'Functionality related to Removing Users.',
              confidence: 0.55,
              sourceUrls: [USERS_URL],
            },
          ],
        },
      ]);
    });

    it('should drop navigation headings with their subtrees', () => {
      const modules = engine.infer([
        {
          sourceUrl: USERS_URL,
          sections: [
            section('Table of Contents', 1, 'Links everywhere.', [section('Hidden Topic', 3)]),
            section('Next', 2),
            section('Page 2', 2),
            section('Webhooks', 1, '', [section('Back to top', 3)]),
          ],
        },
      ]);

      expect(modules.map((module) => module.name)).toEqual(['Webhooks']);
      expect(modules[0].submodules).toEqual([]);
    });

    it('should drop submodules without an enclosing module', () => {
      const modules = engine.infer([
        { sourceUrl: USERS_URL, sections: [section('Orphan Topic', 3, 'Not attached to anything here.')] },
      ]);

      expect(modules).toEqual([]);
    });

    it('should flatten deeper headings into submodules of the nearest module', () => {
      const modules = engine.infer([
        {
          sourceUrl: USERS_URL,
          sections: [section('Access Control', 2, '', [section('Roles', 3, '', [section('Admin Role', 4)])])],
        },
      ]);

      expect(modules[0].submodules.map((sub) => [sub.name, sub.confidence])).toEqual([
        ['Admin Role', 0.55],
        ['Roles', 0.54],
      ]);
    });

    it('should order modules by confidence and keep ties in first-seen order', () => {
      const modules = engine.infer([
        {
          sourceUrl: USERS_URL,
          sections: [
            section('Billing', 1, 'Invoices are issued on the first day of each month.'),
            section('Alpha Tools', 1),
            section('Beta Tools', 1),
          ],
        },
      ]);

      expect(modules.map((module) => [module.name, module.confidence])).toEqual([
        ['Alpha Tools', 0.64],
        ['Beta Tools', 0.64],
        ['Billing', 0.6],
      ]);
      expect(modules[0].description).toBe('Module for Alpha Tools.');
    });

    it('should keep every confidence within bounds', () => {
      const longText = Array.from({ length: 60 }, (_, i) => `Sentence number ${i} explains a detail.`).join(' ');
      const modules = engine.infer([
        {
          sourceUrl: USERS_URL,
          sections: [section('Deployment Pipeline Overview', 1, longText, [section('Stages Explained', 3, longText)])],
        },
      ]);

      const scores = [modules[0].confidence, ...modules[0].submodules.map((sub) => sub.confidence)];
      for (const score of scores) {
        expect(score).toBeGreaterThanOrEqual(0.3);
        expect(score).toBeLessThanOrEqual(0.95);
      }
    });

    it('should return an empty catalog for no pages', () => {
      expect(engine.infer([])).toEqual([]);
    });
  });

  describe('mergeCandidates', () => {
    function candidate(): Candidate {
      const child = engine.createCandidate(section('Inviting Users', 3, 'Send an invite.'), 'submodule');
      return {
        ...engine.createCandidate(section('User Management', 1, 'Manage users.'), 'module'),
        children: [child],
      };
    }

    it('should be idempotent', () => {
      const a = candidate();

      expect(engine.mergeCandidates(a, a)).toEqual(a);
    });

    it('should not modify its inputs', () => {
      const a = candidate();
      const b = engine.createCandidate(section('user managment', 2, 'Suspend accounts.', [], ACCOUNTS_URL), 'module');

      const merged = engine.mergeCandidates(a, b);

      expect(merged.name).toBe('User Management');
      expect(merged.sourceUrls).toEqual([USERS_URL, ACCOUNTS_URL]);
      expect(merged.bodies).toEqual(['Suspend accounts.', 'Manage users.']);
      expect(a.sourceUrls).toEqual([USERS_URL]);
      expect(a.bodies).toEqual(['Manage users.']);
    });
  });

  describe('matches', () => {
    it('should compare normalized titles', () => {
      const a = engine.createCandidate(section('1. Getting Started', 1), 'module');
      const b = engine.createCandidate(section('Getting started:', 2), 'module');
      const c = engine.createCandidate(section('Installation', 2), 'module');

      expect(engine.matches(a, b)).toBe(true);
      expect(engine.matches(a, c)).toBe(false);
    });
  });
});
