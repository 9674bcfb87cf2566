import { describe, expect, it } from 'vitest';
import { detectDelegation, detectFlags, getDelegationSection } from './flag-detector.js';

describe('detectFlags', () => {
  it('reports every flag as absent on plain text', () => {
    expect(detectFlags('divieto di sosta in via Roma')).toEqual({
      publicTransport: 'no T',
      restrictedZone: 'no Z',
      delegation: 'no D',
      bikeLane: 'no P',
      metro: 'no M',
      mobilityAgency: 'no B',
      taxi: 'no T',
    });
  });

  it('matches regardless of case', () => {
    const flags = detectFlags(
      'Accesso alla ZTL dai portali. Sospesa la PISTA CICLABILE, fermata Metro chiusa, ' +
        'stallo TAXI spostato, sentita Brescia Mobilità, deviate le linee bus.'
    );
    expect(flags).toEqual({
      publicTransport: 'TRASPORTO_SI',
      restrictedZone: 'ZTL_SI',
      delegation: 'no D',
      bikeLane: 'PISTA CICLABILE SI',
      metro: 'METRO SI',
      mobilityAgency: "BRESCIA MOBILITA' SI",
      taxi: 'TAXI SI',
    });
  });

  it('does not match words that only contain a keyword', () => {
    const flags = detectFlags('parametro dei taxisti');
    expect(flags.metro).toBe('no M');
    expect(flags.taxi).toBe('no T');
  });
});

describe('delegation', () => {
  it('reads only the DEMANDA section', () => {
    const text = 'Settore Strade\nsegnaletica\nDEMANDA\nalla Polizia Locale i controlli.\nAVVERTE\nche';
    expect(getDelegationSection(text)).toBe('\nalla Polizia Locale i controlli.\n');
    expect(detectDelegation(text)).toBe('no D');
  });

  it('is set when signage is placed by the road or traffic department', () => {
    expect(detectDelegation('DEMANDA al Servizio Gestione Traffico la posa della segnaletica. AVVERTE')).toBe(
      'SQ. MULTIDISC. SI'
    );
  });

  it('stays unset when the contractor places the signage', () => {
    expect(detectDelegation("DEMANDA all'impresa esecutrice il posizionamento della segnaletica. AVVERTE")).toBe('no D');
  });

  it('checks the department before the contractor', () => {
    const text = 'DEMANDA al Settore Strade il posizionamento della segnaletica e all’impresa la manutenzione.';
    expect(detectDelegation(text)).toBe('SQ. MULTIDISC. SI');
  });

  it('is unset without a DEMANDA section', () => {
    expect(detectDelegation('Settore Strade posizionamento segnaletica')).toBe('no D');
  });
});
