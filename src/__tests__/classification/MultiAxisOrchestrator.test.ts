/**
 * Unit Tests for Multi-Axis Orchestrator
 * End-to-end scenarios on the bundled keyword data plus isolated fixtures
 */

import { ArbitrationProvider, DisabledArbitrationProvider } from '../../arbitration/ArbitrationProvider';
import { AxisRegistry, defaultAxisRegistry } from '../../classification/AxisRegistry';
import {
  parseClassificationContext,
  serializeClassificationContext,
  toClassificationContext,
} from '../../classification/ClassificationContext';
import { MultiAxisOrchestrator } from '../../classification/MultiAxisOrchestrator';
import { ConfigurationError } from '../../errors';
import { ScriptedArbitrationProvider } from '../fixtures/axes';

class MisconfiguredProvider implements ArbitrationProvider {
  readonly name = 'misconfigured';

  get available(): boolean {
    throw new Error('provider misconfigured');
  }

  async arbitrate(): Promise<string> {
    return 'AUCUN';
  }
}

const fixtureRegistry = AxisRegistry.fromDefinitions([
  {
    id: 'project',
    prefix: 'P_',
    labels: { P_Alpha: { keywords: ['alpha'] } },
  },
  {
    id: 'supplier',
    prefix: 'F_',
    labels: {
      F_First: { keywords: ['first'] },
      F_Second: { keywords: ['second'] },
    },
  },
]);
const FIXTURE_ORDER = ['project', 'supplier'];

describe('MultiAxisOrchestrator', () => {
  const registry = defaultAxisRegistry();

  describe('bundled axes', () => {
    it('accepts a purchase order through the heuristic path', async () => {
      const provider = new ScriptedArbitrationProvider(() => 'AUCUN');
      const orchestrator = new MultiAxisOrchestrator({ registry, provider });

      const output = await orchestrator.classify(
        'Bon de commande reçu',
        'Merci de traiter notre commande.'
      );

      const messageType = output.axes.message_type;
      expect(messageType.value).toBe('T_Commande');
      expect(messageType.method).toBe('heuristic');
      expect(messageType.confidence).toBeCloseTo(7 / 11, 10);
      expect(messageType.candidates[0]).toEqual({
        label: 'T_Commande',
        score: 7,
        hits: ['subj:bon de commande', 'subj:commande', 'body:commande'],
      });
      expect(provider.prompts.some((prompt) => prompt.includes('Axe : message_type '))).toBe(false);
    });

    it('resolves the critical design review milestone', async () => {
      const orchestrator = new MultiAxisOrchestrator({
        registry,
        provider: new DisabledArbitrationProvider(),
      });

      const output = await orchestrator.classify(
        'CDR Review - Project X',
        'Nous préparons la revue critique de design CDR.'
      );

      expect(output.axes.milestone.value).toBe('J_CDR');
      expect(output.axes.milestone.method).toBe('heuristic');
      expect(output.categories).toContain('J_CDR');
    });

    it('extracts serial numbers on the equipment designation axis only', async () => {
      const orchestrator = new MultiAxisOrchestrator({
        registry,
        provider: new DisabledArbitrationProvider(),
      });

      const output = await orchestrator.classify('Retour SN:12345', 'Camera CAM-001 en panne');

      expect(output.serialNumbers).toEqual(['CAM-001', 'SN:12345']);
      expect(output.axes.equipment_designation.serialNumbers).toEqual(['CAM-001', 'SN:12345']);
      for (const [axisId, result] of Object.entries(output.axes)) {
        if (axisId !== 'equipment_designation') {
          expect(result.serialNumbers).toEqual([]);
        }
      }
    });

    it('lists accepted labels in processing order', async () => {
      const orchestrator = new MultiAxisOrchestrator({
        registry,
        provider: new DisabledArbitrationProvider(),
      });

      const output = await orchestrator.classify(
        'Bon de commande reçu',
        'Merci de traiter notre commande.'
      );

      expect(Object.keys(output.axes)).toEqual(registry.ids());
      expect(output.categories).toEqual(['T_Commande', 'S_Action_Requise']);
    });

    it('accepts nothing above the maximum confidence', async () => {
      const orchestrator = new MultiAxisOrchestrator({
        registry,
        provider: new DisabledArbitrationProvider(),
        settings: { confidenceThreshold: 1.1 },
      });

      const output = await orchestrator.classify(
        'Bon de commande reçu',
        'Merci de traiter notre commande.'
      );

      expect(output.axes.message_type.value).toBe('T_Commande');
      expect(output.categories).toEqual([]);
    });

    it('round-trips the classification context', async () => {
      const orchestrator = new MultiAxisOrchestrator({
        registry,
        provider: new ScriptedArbitrationProvider(() => 'AUCUN'),
      });

      const output = await orchestrator.classify(
        'CDR Review - Project X',
        'Revue critique de design CDR, unité CAM-001.'
      );
      const parsed = parseClassificationContext(serializeClassificationContext(output));

      expect(parsed).toEqual(toClassificationContext(output));
      for (const [axisId, result] of Object.entries(output.axes)) {
        expect(parsed.axes[axisId].value).toBe(result.value);
        expect(parsed.axes[axisId].method).toBe(result.method);
        expect(parsed.axes[axisId].confidence).toBeCloseTo(result.confidence, 2);
      }
    });
  });

  describe('processing order', () => {
    it('runs a per-call order and skips unknown axes', async () => {
      const orchestrator = new MultiAxisOrchestrator({
        registry,
        provider: new DisabledArbitrationProvider(),
      });

      const output = await orchestrator.classify('CDR', '', undefined, [
        'milestone',
        'weather',
        'message_type',
      ]);

      expect(Object.keys(output.axes)).toEqual(['milestone', 'message_type']);
    });

    it('uses the configured order', () => {
      const orchestrator = new MultiAxisOrchestrator({
        registry: fixtureRegistry,
        provider: new DisabledArbitrationProvider(),
        settings: { axisOrder: FIXTURE_ORDER },
      });

      expect(orchestrator.processingOrder).toEqual(FIXTURE_ORDER);
    });

    it('passes labels resolved earlier to later arbitration prompts', async () => {
      const provider = new ScriptedArbitrationProvider(() => 'F_Second');
      const orchestrator = new MultiAxisOrchestrator({
        registry: fixtureRegistry,
        provider,
        settings: { axisOrder: FIXTURE_ORDER },
      });

      const output = await orchestrator.classify('Alpha', 'first and second');

      expect(output.axes.project.value).toBe('P_Alpha');
      expect(output.axes.supplier).toMatchObject({ value: 'F_Second', method: 'llm' });
      expect(provider.prompts).toHaveLength(1);
      expect(provider.prompts[0]).toContain('  project: P_Alpha');
    });
  });

  describe('arbitration context', () => {
    it('concatenates a conversation into one document', async () => {
      const provider = new ScriptedArbitrationProvider(() => 'AUCUN');
      const orchestrator = new MultiAxisOrchestrator({
        registry: fixtureRegistry,
        provider,
        settings: { axisOrder: FIXTURE_ORDER },
      });

      await orchestrator.classifyConversation([
        { subject: 'Alpha', body: 'first' },
        { subject: '', body: '' },
        { subject: 'Re: alpha', body: 'second' },
      ]);

      expect(provider.prompts).toHaveLength(1);
      expect(provider.prompts[0]).toContain(
        'Subject: Alpha | Re: alpha\n\nBody: first\n\n---\n\nsecond'
      );
    });

    it('uses the summary instead of a raw excerpt', async () => {
      const provider = new ScriptedArbitrationProvider(() => 'AUCUN');
      const orchestrator = new MultiAxisOrchestrator({
        registry: fixtureRegistry,
        provider,
        settings: { axisOrder: FIXTURE_ORDER },
      });

      await orchestrator.classify('Sans rapport', 'Texte libre', 'Résumé : relance fournisseur');

      expect(provider.prompts).toHaveLength(2);
      expect(provider.prompts[0]).toContain('Résumé : relance fournisseur');
      expect(provider.prompts[0]).not.toContain('Subject:');
    });

    it('clips the body excerpt used as default context', async () => {
      const provider = new ScriptedArbitrationProvider(() => 'AUCUN');
      const orchestrator = new MultiAxisOrchestrator({
        registry: fixtureRegistry,
        provider,
        settings: { axisOrder: ['project'] },
      });

      await orchestrator.classify('Sans rapport', 'z'.repeat(1500));

      expect(provider.prompts[0]).toContain(`Body: ${'z'.repeat(1000)}\n`);
      expect(provider.prompts[0]).not.toContain('z'.repeat(1001));
    });
  });

  describe('failure isolation', () => {
    it('records a failing axis as none and carries on', async () => {
      const orchestrator = new MultiAxisOrchestrator({
        registry: fixtureRegistry,
        provider: new MisconfiguredProvider(),
        settings: { axisOrder: FIXTURE_ORDER },
      });

      const output = await orchestrator.classify('Alpha', 'rien');

      expect(output.axes.project).toMatchObject({ value: 'P_Alpha', method: 'heuristic' });
      expect(output.axes.supplier).toMatchObject({ value: null, confidence: 0, method: 'none' });
      expect(output.axes.supplier.debug.error).toBe('provider misconfigured');
      expect(output.categories).toEqual(['P_Alpha']);
    });

    it('rejects invalid settings at construction', () => {
      expect(
        () =>
          new MultiAxisOrchestrator({
            registry: fixtureRegistry,
            provider: new DisabledArbitrationProvider(),
            settings: { confidenceThreshold: -1 },
          })
      ).toThrow(ConfigurationError);
    });
  });
});
