import { Router } from 'express';
import { z } from 'zod';
import {
  entanglement,
  FIBONACCI,
  flowerOfLifePattern,
  gratitudePractice,
  goldenRatioLevels,
  intentionSetting,
  manifestationRitual,
  observerEffect,
  PHI,
  PLATONIC_SOLIDS,
  principleCauseEffect,
  principleCorrespondence,
  principleGender,
  principleMentalism,
  principlePolarity,
  principleRhythm,
  principleVibration,
  protectionRitual,
  superposition,
  TradeDesk,
  vesicaPiscisRatio,
} from '../services/formulas';
import { createLogger } from '../utils/logger';
import { nowIso } from '../utils/time';
import { finiteNumber, numberSeries, parseWith } from './validation';

const logger = createLogger('FormulaAPI');

export const FIBONACCI_RESPONSE_LEVELS = 10;

const priceParams = z.object({ price: finiteNumber });
const frequencyParams = z.object({ frequency: finiteNumber });
const abParams = z.object({ a: finiteNumber, b: finiteNumber });
const scaleParams = z.object({ macro: finiteNumber, micro: finiteNumber });
const polarityParams = z.object({ bull: finiteNumber, bear: finiteNumber });
const genderParams = z.object({ masculine: finiteNumber, feminine: finiteNumber });
const profitParams = z.object({ entry: finiteNumber, exit: finiteNumber, amount: finiteNumber });

const nonEmpty = z.string().trim().min(1);

const mentalismBody = z.object({
  intention: nonEmpty,
  marketSentiment: z.number().finite().default(0.5),
});
const causeEffectBody = z.object({ cause: nonEmpty, effect: z.number().finite() });
const observerBody = z.object({
  observation: nonEmpty,
  marketState: z.record(z.unknown()).default({}),
});
const intentionBody = z.object({ goal: nonEmpty, affirmation: nonEmpty });
const gratitudeBody = z.object({ gratitudeFor: nonEmpty });
const protectionBody = z.object({
  protectedEntity: nonEmpty,
  protectionType: nonEmpty.optional(),
});
const manifestationBody = z.object({
  desire: nonEmpty,
  visualization: nonEmpty,
  action: nonEmpty,
});
const tradeBody = z.object({
  asset: nonEmpty,
  amount: z.number().finite(),
  price: z.number().finite(),
});
const analyzeBody = z.object({
  asset: nonEmpty,
  price: z.number().finite(),
  volume: z.number().finite(),
});

export function createFormulaRouter(tradeDesk: TradeDesk): Router {
  const router = Router();

  // Sacred geometry
  router.get('/sacred-geometry/fibonacci/:price', (req, res) => {
    const { price } = parseWith(priceParams, req.params);
    res.json({
      status: 'success',
      price,
      goldenRatio: PHI,
      fibonacciLevels: goldenRatioLevels(price).slice(0, FIBONACCI_RESPONSE_LEVELS),
      timestamp: nowIso(),
    });
  });

  router.post('/sacred-geometry/flower-of-life', (req, res) => {
    const data = parseWith(numberSeries, req.body);
    res.json({ status: 'success', pattern: flowerOfLifePattern(data), timestamp: nowIso() });
  });

  router.get('/sacred-geometry/platonic-solids', (_req, res) => {
    res.json({
      status: 'success',
      platonicSolids: PLATONIC_SOLIDS,
      fibonacci: FIBONACCI,
      interpretation: 'Each solid represents a level of consciousness',
      timestamp: nowIso(),
    });
  });

  router.get('/sacred-geometry/vesica-piscis/:a/:b', (req, res) => {
    const { a, b } = parseWith(abParams, req.params);
    res.json({ status: 'success', ratio: vesicaPiscisRatio(a, b), timestamp: nowIso() });
  });

  // Hermetic principles
  router.post('/hermetic/mentalism', (req, res) => {
    const { intention, marketSentiment } = parseWith(mentalismBody, req.body);
    res.json({
      status: 'success',
      principle: principleMentalism(intention, marketSentiment),
      timestamp: nowIso(),
    });
  });

  router.get('/hermetic/correspondence/:macro/:micro', (req, res) => {
    const { macro, micro } = parseWith(scaleParams, req.params);
    res.json({
      status: 'success',
      principle: principleCorrespondence(macro, micro),
      timestamp: nowIso(),
    });
  });

  router.get('/hermetic/vibration/:frequency', (req, res) => {
    const { frequency } = parseWith(frequencyParams, req.params);
    res.json({ status: 'success', principle: principleVibration(frequency), timestamp: nowIso() });
  });

  router.get('/hermetic/polarity/:bull/:bear', (req, res) => {
    const { bull, bear } = parseWith(polarityParams, req.params);
    res.json({ status: 'success', principle: principlePolarity(bull, bear), timestamp: nowIso() });
  });

  router.post('/hermetic/rhythm', (req, res) => {
    const prices = parseWith(numberSeries, req.body);
    res.json({ status: 'success', principle: principleRhythm(prices), timestamp: nowIso() });
  });

  router.post('/hermetic/cause-effect', (req, res) => {
    const { cause, effect } = parseWith(causeEffectBody, req.body);
    res.json({
      status: 'success',
      principle: principleCauseEffect(cause, effect),
      timestamp: nowIso(),
    });
  });

  router.get('/hermetic/gender/:masculine/:feminine', (req, res) => {
    const { masculine, feminine } = parseWith(genderParams, req.params);
    res.json({
      status: 'success',
      principle: principleGender(masculine, feminine),
      timestamp: nowIso(),
    });
  });

  // Quantum
  router.post('/quantum/observer-effect', (req, res) => {
    const { observation, marketState } = parseWith(observerBody, req.body);
    res.json({
      status: 'success',
      principle: observerEffect(observation, marketState),
      timestamp: nowIso(),
    });
  });

  router.get('/quantum/superposition/:a/:b', (req, res) => {
    const { a, b } = parseWith(abParams, req.params);
    res.json({ status: 'success', principle: superposition(a, b), timestamp: nowIso() });
  });

  router.get('/quantum/entanglement/:a/:b', (req, res) => {
    const { a, b } = parseWith(abParams, req.params);
    res.json({ status: 'success', principle: entanglement(a, b), timestamp: nowIso() });
  });

  // Practice
  router.get('/practice/status', (_req, res) => {
    res.json({ status: 'success', practice: tradeDesk.status(), timestamp: nowIso() });
  });

  router.post('/practice/intention', (req, res) => {
    const { goal, affirmation } = parseWith(intentionBody, req.body);
    logger.info(`✓ Intention set: ${goal}`);
    res.json({ status: 'success', intention: intentionSetting(goal, affirmation), timestamp: nowIso() });
  });

  router.post('/practice/gratitude', (req, res) => {
    const { gratitudeFor } = parseWith(gratitudeBody, req.body);
    res.json({ status: 'success', gratitude: gratitudePractice(gratitudeFor), timestamp: nowIso() });
  });

  router.post('/practice/protection', (req, res) => {
    const { protectedEntity, protectionType } = parseWith(protectionBody, req.body);
    res.json({
      status: 'success',
      protection: protectionRitual(protectedEntity, protectionType),
      timestamp: nowIso(),
    });
  });

  router.post('/practice/manifestation', (req, res) => {
    const { desire, visualization, action } = parseWith(manifestationBody, req.body);
    res.json({
      status: 'success',
      ritual: manifestationRitual(desire, visualization, action),
      timestamp: nowIso(),
    });
  });

  // Trade desk
  router.post('/trade/analyze', (req, res) => {
    const { asset, price, volume } = parseWith(analyzeBody, req.body);
    res.json({
      status: 'success',
      analysis: tradeDesk.analyzeOpportunity(asset, price, volume),
      timestamp: nowIso(),
    });
  });

  router.post('/trade/execute', (req, res) => {
    const { asset, amount, price } = parseWith(tradeBody, req.body);
    res.json({
      status: 'success',
      trade: tradeDesk.executeTrade(asset, amount, price),
      timestamp: nowIso(),
    });
  });

  router.get('/trade/profit/:entry/:exit/:amount', (req, res) => {
    const { entry, exit, amount } = parseWith(profitParams, req.params);
    res.json({
      status: 'success',
      profit: tradeDesk.calculateProfit(entry, exit, amount),
      timestamp: nowIso(),
    });
  });

  return router;
}
