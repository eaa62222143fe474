/**
 * Deal Type Packs
 *
 * Documents driven by the legal structure of the transaction. A share deal
 * looks at the equity being bought, an asset deal at what is being carved out,
 * a merger at the combination procedure itself.
 */

import type { DealType, DocumentTemplate } from '../types/index.js';
import { freezePack } from './freeze-pack.js';

const assetDealRules: readonly DocumentTemplate[] = freezePack([
  { key: 'doc.asset_list', category: 'Legal', required: true, priority: 'High' },
  { key: 'doc.asset_transfer_agreements', category: 'Legal', required: true, priority: 'High' },
  { key: 'doc.asset_transfer_consents', category: 'Legal', required: true, priority: 'High' },
  { key: 'doc.asset_transfer_tax_analysis', category: 'Tax', required: true, priority: 'High' },
  { key: 'doc.asset_valuations', category: 'Financial', required: true, priority: 'High' },
  { key: 'doc.assumed_liabilities_schedule', category: 'Legal', required: true, priority: 'High' },
]);

const shareDealRules: readonly DocumentTemplate[] = freezePack([
  { key: 'doc.shareholder_agreements', category: 'Legal', required: true, priority: 'High' },
  { key: 'doc.share_certificates', category: 'Legal', required: true, priority: 'High' },
  { key: 'doc.cap_table', category: 'Legal', required: true, priority: 'High' },
  { key: 'doc.share_transfer_restrictions', category: 'Legal', required: true, priority: 'High' },
  { key: 'doc.drag_tag_provisions', category: 'Legal', required: true, priority: 'Medium' },
  { key: 'doc.minority_shareholder_rights', category: 'Legal', required: true, priority: 'Medium' },
  { key: 'doc.dividend_history', category: 'Financial', required: true, priority: 'Medium' },
  { key: 'doc.stock_option_agreements', category: 'Legal', required: false, priority: 'Medium' },
]);

const mergerRules: readonly DocumentTemplate[] = freezePack([
  { key: 'doc.merger_plan', category: 'Legal', required: true, priority: 'High' },
  { key: 'doc.fairness_opinion', category: 'Financial', required: true, priority: 'High' },
  { key: 'doc.exchange_ratio_justification', category: 'Legal', required: true, priority: 'High' },
  { key: 'doc.merger_regulatory_notifications', category: 'Legal', required: true, priority: 'High' },
  { key: 'doc.antitrust_analysis', category: 'Compliance', required: true, priority: 'High' },
  { key: 'doc.creditor_notification', category: 'Legal', required: true, priority: 'High' },
  { key: 'doc.integration_plan', category: 'HR', required: true, priority: 'Medium' },
  { key: 'doc.synergies_analysis', category: 'Financial', required: true, priority: 'Medium' },
]);

export const dealTypeRules: Readonly<Record<DealType, readonly DocumentTemplate[]>> = Object.freeze({
  'Share Deal': shareDealRules,
  'Asset Deal': assetDealRules,
  'Merger': mergerRules,
});
