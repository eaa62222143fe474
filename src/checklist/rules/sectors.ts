/**
 * Sector Packs
 *
 * Documents specific to the target's industry: operating licences,
 * sector regulators, and the assets that carry the value in that sector.
 */

import type { DocumentTemplate, Sector } from '../types/index.js';
import { freezePack } from './freeze-pack.js';

const healthcareRules: readonly DocumentTemplate[] = freezePack([
  { key: 'doc.healthcare_operating_licences', category: 'Compliance', required: true, priority: 'High' },
  { key: 'doc.patient_data_compliance', category: 'Compliance', required: true, priority: 'High' },
  { key: 'doc.equipment_certifications', category: 'Operational', required: true, priority: 'High' },
  { key: 'doc.clinical_trial_authorizations', category: 'Compliance', required: false, priority: 'Medium' },
  { key: 'doc.pharmacy_licences', category: 'Compliance', required: false, priority: 'High' },
  { key: 'doc.medical_staff_credentials', category: 'HR', required: true, priority: 'High' },
  { key: 'doc.health_safety_inspections', category: 'Operational', required: true, priority: 'Medium' },
  { key: 'doc.national_health_service_agreements', category: 'Compliance', required: false, priority: 'Medium' },
]);

const technologyRules: readonly DocumentTemplate[] = freezePack([
  { key: 'doc.ip_portfolio', category: 'IP', required: true, priority: 'High' },
  { key: 'doc.software_licences_inbound', category: 'IP', required: true, priority: 'High' },
  { key: 'doc.software_licences_outbound', category: 'IP', required: true, priority: 'High' },
  { key: 'doc.source_code_escrow', category: 'IP', required: false, priority: 'Medium' },
  { key: 'doc.open_source_audit', category: 'IP', required: true, priority: 'High' },
  { key: 'doc.saas_metrics', category: 'Commercial', required: true, priority: 'High' },
  { key: 'doc.it_security_audit', category: 'Operational', required: true, priority: 'High' },
  { key: 'doc.data_breach_history', category: 'Compliance', required: true, priority: 'Medium' },
  { key: 'doc.tech_talent_retention', category: 'HR', required: false, priority: 'Medium' },
  { key: 'doc.customer_sla_contracts', category: 'Commercial', required: true, priority: 'Medium' },
]);

const industrialRules: readonly DocumentTemplate[] = freezePack([
  { key: 'doc.environmental_permits', category: 'Compliance', required: true, priority: 'High' },
  { key: 'doc.health_safety_certifications', category: 'Compliance', required: true, priority: 'High' },
  { key: 'doc.equipment_maintenance_logs', category: 'Operational', required: true, priority: 'Medium' },
  { key: 'doc.production_capacity_reports', category: 'Operational', required: true, priority: 'Medium' },
  { key: 'doc.environmental_remediation', category: 'Compliance', required: true, priority: 'High' },
  { key: 'doc.supply_chain_contracts', category: 'Operational', required: true, priority: 'Medium' },
  { key: 'doc.quality_certifications', category: 'Compliance', required: true, priority: 'Medium' },
  { key: 'doc.fixed_asset_register', category: 'Operational', required: true, priority: 'High' },
]);

const realEstateRules: readonly DocumentTemplate[] = freezePack([
  { key: 'doc.property_title_deeds', category: 'Legal', required: true, priority: 'High' },
  { key: 'doc.land_registry_certificates', category: 'Legal', required: true, priority: 'High' },
  { key: 'doc.tenant_lease_agreements', category: 'Commercial', required: true, priority: 'High' },
  { key: 'doc.building_permits', category: 'Legal', required: true, priority: 'High' },
  { key: 'doc.property_valuations', category: 'Financial', required: true, priority: 'High' },
  { key: 'doc.environmental_site_assessments', category: 'Compliance', required: true, priority: 'Medium' },
  { key: 'doc.property_management_contracts', category: 'Operational', required: true, priority: 'Medium' },
  { key: 'doc.rental_income_schedule', category: 'Financial', required: true, priority: 'High' },
  { key: 'doc.easements_encumbrances', category: 'Legal', required: true, priority: 'High' },
]);

const financialServicesRules: readonly DocumentTemplate[] = freezePack([
  { key: 'doc.financial_regulatory_licences', category: 'Compliance', required: true, priority: 'High' },
  { key: 'doc.capital_adequacy_reports', category: 'Compliance', required: true, priority: 'High' },
  { key: 'doc.aml_kyc_procedures', category: 'Compliance', required: true, priority: 'High' },
  { key: 'doc.regulatory_inspection_reports', category: 'Compliance', required: true, priority: 'High' },
  { key: 'doc.credit_portfolio_analysis', category: 'Financial', required: true, priority: 'High' },
  { key: 'doc.impairment_schedules', category: 'Financial', required: true, priority: 'High' },
  { key: 'doc.compliance_officer_reports', category: 'Compliance', required: true, priority: 'Medium' },
  { key: 'doc.it_cybersecurity_audit', category: 'Operational', required: true, priority: 'High' },
  { key: 'doc.client_complaints_register', category: 'Compliance', required: false, priority: 'Medium' },
]);

const retailRules: readonly DocumentTemplate[] = freezePack([
  { key: 'doc.franchise_agreements', category: 'Commercial', required: true, priority: 'High' },
  { key: 'doc.ecommerce_metrics', category: 'Commercial', required: false, priority: 'Medium' },
  { key: 'doc.store_leases', category: 'Legal', required: true, priority: 'High' },
  { key: 'doc.trademark_registrations', category: 'IP', required: true, priority: 'High' },
  { key: 'doc.inventory_reports', category: 'Operational', required: true, priority: 'Medium' },
  { key: 'doc.loyalty_programme', category: 'Commercial', required: false, priority: 'Low' },
  { key: 'doc.consumer_protection_compliance', category: 'Compliance', required: true, priority: 'Medium' },
  { key: 'doc.store_profitability_analysis', category: 'Operational', required: true, priority: 'High' },
]);

export const sectorRules: Readonly<Record<Sector, readonly DocumentTemplate[]>> = Object.freeze({
  'Healthcare': healthcareRules,
  'Technology': technologyRules,
  'Industrial': industrialRules,
  'Real Estate': realEstateRules,
  'Financial Services': financialServicesRules,
  'Retail': retailRules,
});
