import { PlanetRecord } from '../types/planet';

export function buildQuestionPrompt(question: string): string {
  return [
    `As an expert in exoplanetary science, provide a detailed and comprehensive answer to: ${question.trim()}`,
    '',
    'Include relevant scientific concepts, examples, and explanations where appropriate. ' +
      'Format the response with proper markdown for readability.'
  ].join('\n');
}

export function formatPlanetSummary(record: PlanetRecord): string {
  return [
    `Planet Name: ${record.name}`,
    `Host Star: ${record.hostName}`,
    `Planet Mass (Earth masses): ${record.planetMassEarth.toFixed(2)}`,
    `Orbital Period (days): ${record.orbitalPeriodDays.toFixed(2)}`,
    `Semi-major Axis (AU): ${record.semiMajorAxisAU.toFixed(2)}`,
    `Star Mass (Solar masses): ${record.starMassSolar.toFixed(2)}`
  ].join('\n');
}

export function buildPlanetPrompt(record: PlanetRecord): string {
  return `Analyze this exoplanet data and explain its key features in about 100 words:\n${formatPlanetSummary(record)}`;
}
