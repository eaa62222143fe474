/**
 * Base Pack — Always Request
 *
 * Documents requested for every deal regardless of deal type, sector or
 * jurisdiction. Axis-specific packs are added on top of these.
 */

import type { DocumentTemplate } from '../types/index.js';
import { freezePack } from './freeze-pack.js';

export const basePackRules: readonly DocumentTemplate[] = freezePack([
  // -------------------------------------------------------------------------
  // Corporate
  // -------------------------------------------------------------------------
  { key: 'doc.articles_of_association', category: 'Legal', required: true, priority: 'High' },
  { key: 'doc.certificate_of_incorporation', category: 'Legal', required: true, priority: 'High' },
  { key: 'doc.board_minutes', category: 'Legal', required: true, priority: 'High' },
  { key: 'doc.powers_of_attorney', category: 'Legal', required: true, priority: 'Medium' },
  { key: 'doc.pending_litigation', category: 'Legal', required: true, priority: 'High' },
  { key: 'doc.regulatory_licences', category: 'Legal', required: true, priority: 'High' },

  // -------------------------------------------------------------------------
  // Financial
  // -------------------------------------------------------------------------
  { key: 'doc.audited_financial_statements', category: 'Financial', required: true, priority: 'High' },
  { key: 'doc.management_accounts', category: 'Financial', required: true, priority: 'High' },
  { key: 'doc.budget_forecasts', category: 'Financial', required: true, priority: 'Medium' },
  { key: 'doc.debt_schedule', category: 'Financial', required: true, priority: 'High' },
  { key: 'doc.bank_statements', category: 'Financial', required: true, priority: 'Medium' },
  { key: 'doc.receivables_payables_aging', category: 'Financial', required: true, priority: 'Medium' },

  // -------------------------------------------------------------------------
  // Tax
  // -------------------------------------------------------------------------
  { key: 'doc.corporate_tax_returns', category: 'Tax', required: true, priority: 'High' },
  { key: 'doc.vat_returns', category: 'Tax', required: true, priority: 'High' },
  { key: 'doc.tax_assessments', category: 'Tax', required: true, priority: 'High' },
  { key: 'doc.transfer_pricing', category: 'Tax', required: false, priority: 'Medium' },

  // -------------------------------------------------------------------------
  // People
  // -------------------------------------------------------------------------
  { key: 'doc.employee_list', category: 'HR', required: true, priority: 'High' },
  { key: 'doc.key_employment_contracts', category: 'HR', required: true, priority: 'High' },
  { key: 'doc.collective_agreements', category: 'HR', required: true, priority: 'Medium' },
  { key: 'doc.pension_plans', category: 'HR', required: true, priority: 'Medium' },
  { key: 'doc.org_chart', category: 'HR', required: true, priority: 'Low' },

  // -------------------------------------------------------------------------
  // Commercial
  // -------------------------------------------------------------------------
  { key: 'doc.top_customer_contracts', category: 'Commercial', required: true, priority: 'High' },
  { key: 'doc.top_supplier_contracts', category: 'Commercial', required: true, priority: 'High' },
  { key: 'doc.material_contracts_summary', category: 'Commercial', required: true, priority: 'High' },

  // -------------------------------------------------------------------------
  // Compliance & insurance
  // -------------------------------------------------------------------------
  { key: 'doc.data_protection_policies', category: 'Compliance', required: true, priority: 'High' },
  { key: 'doc.aml_policies', category: 'Compliance', required: false, priority: 'Medium' },
  { key: 'doc.insurance_schedule', category: 'Compliance', required: true, priority: 'High' },
  { key: 'doc.insurance_claims', category: 'Compliance', required: false, priority: 'Medium' },
]);
