import { TemplatesService } from './templates.service';
import {
  ContractTypeNotFoundException,
  TemplateNotFoundException,
} from './exceptions/template.exceptions';

describe('TemplatesService', () => {
  const service = new TemplatesService();

  describe('catalogue', () => {
    it('lists every template and filters by category and jurisdiction', () => {
      expect(service.listTemplates().map((t) => t.id)).toEqual([
        'tpl_residential_lease_v1',
        'tpl_services_v1',
        'tpl_sale_v1',
        'tpl_nda_v1',
        'tpl_employment_v1',
      ]);
      expect(service.listTemplates({ category: 'commercial' }).map((t) => t.id)).toEqual([
        'tpl_sale_v1',
        'tpl_nda_v1',
      ]);
      expect(service.listTemplates({ jurisdiction: 'XX' })).toEqual([]);
    });

    it('finds a template by id', () => {
      expect(service.getTemplate('tpl_nda_v1').contractType).toBe('NDA');
      expect(service.findTemplate('tpl_unknown')).toBeUndefined();
    });

    it('throws for unknown templates and types', () => {
      expect(() => service.getTemplate('tpl_unknown')).toThrow(TemplateNotFoundException);
      expect(() => service.getContractType('LOAN')).toThrow('Schema for type LOAN not found');
      expect(() => service.getContractType('LOAN')).toThrow(ContractTypeNotFoundException);
    });

    it('falls back to the default body for types without their own', () => {
      expect(service.getBody('SALE')).toContain('<h1>AGREEMENT</h1>');
      expect(service.getBody('NDA')).toContain('<h1>NON-DISCLOSURE AGREEMENT</h1>');
    });
  });

  describe('validateInputs', () => {
    const completeNda = {
      disclosing_party: 'Acme Corp',
      receiving_party: 'Jane Roe',
      confidential_subject: 'Product roadmap',
    };

    it('accepts complete inputs', () => {
      expect(service.validateInputs('NDA', completeNda)).toEqual({
        valid: true,
        errors: [],
        warnings: [],
      });
    });

    it('reports empty inputs and missing required fields', () => {
      const report = service.validateInputs('NDA', {});

      expect(report.valid).toBe(false);
      expect(report.errors).toEqual([
        'No inputs provided',
        'Missing required field: disclosing_party',
        'Missing required field: receiving_party',
        'Missing required field: confidential_subject',
      ]);
    });

    it('stops at an unknown contract type', () => {
      expect(service.validateInputs('LOAN', { amount: 5 })).toEqual({
        valid: false,
        errors: ['Unknown contract type: LOAN'],
        warnings: [],
      });
    });

    it('checks numeric fields and warns about unknown ones', () => {
      const report = service.validateInputs('SERVICES', {
        client_name: 'Acme Corp',
        contractor_name: 'Jane Roe',
        scope: 'Website redesign',
        fee: 'a lot',
        colour: 'blue',
      });

      expect(report.errors).toEqual(['Field fee must be a number']);
      expect(report.warnings).toEqual([
        'Unknown field will be ignored: colour',
        'Specifying a start date is recommended',
      ]);
    });

    it('rejects values outside a select field\'s options', () => {
      const report = service.validateInputs('EMPLOYMENT', {
        employer_name: 'Acme Corp',
        employee_name: 'Jane Roe',
        position: 'Engineer',
        salary: 90000,
        contract_term: 'FOREVER',
        start_date: '2026-01-01',
      });

      expect(report.errors).toEqual([
        'Field contract_term must be one of: PERMANENT, FIXED, PROJECT',
      ]);
    });

    it('accepts numeric strings for number fields', () => {
      const report = service.validateInputs('SERVICES', {
        client_name: 'Acme Corp',
        contractor_name: 'Jane Roe',
        scope: 'Website redesign',
        fee: '1500',
        start_date: '2026-01-01',
      });

      expect(report).toEqual({ valid: true, errors: [], warnings: [] });
    });
  });
});
