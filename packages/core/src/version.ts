/**
 * Evaluation-logic version
 *
 * Stamped on every strategy config and therefore on every experience record
 * and playbook snapshot. Bump it by hand, with a changelog line, whenever a
 * change alters which bets are selected or how they settle.
 *
 * 1.0.0  edge = model_prob - implied_prob * margin
 * 2.0.0  edge = win_odds - (1 / model_prob) / margin
 */
export const EVALUATION_LOGIC_VERSION = '2.0.0';
