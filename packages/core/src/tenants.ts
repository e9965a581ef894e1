export const DEFAULT_BUSINESS_ID = "island_harvest";

export type BusinessType = "distribution" | "agriculture" | "service" | "retail";

export type BusinessProfile = {
  id: string;
  name: string;
  tagline: string;
  location: string;
  businessType: BusinessType;
  modules: readonly string[];
  active: boolean;
};

const businessProfiles: readonly BusinessProfile[] = [
  {
    id: "island_harvest",
    name: "Island Harvest Hub",
    tagline: "Farm-to-Table Distribution",
    location: "Port Antonio, Jamaica",
    businessType: "distribution",
    modules: ["customers", "suppliers", "orders", "financials", "operations", "communications"],
    active: true
  },
  {
    id: "bornfidis_provisions",
    name: "Bornfidis Provisions",
    tagline: "Agriculture & Food Logistics",
    location: "Jamaica",
    businessType: "agriculture",
    modules: ["suppliers", "inventory", "logistics", "financials", "operations"],
    active: true
  },
  {
    id: "private_chef",
    name: "Private Chef Services",
    tagline: "Private dining and catering",
    location: "Okemo Valley, Vermont",
    businessType: "service",
    modules: ["clients", "bookings", "menus", "financials", "communications"],
    active: true
  },
  {
    id: "bornfidis_sportswear",
    name: "Bornfidis Sportswear",
    tagline: "Sustainable Activewear",
    location: "Jamaica & Vermont",
    businessType: "retail",
    modules: ["inventory", "orders", "customers", "financials", "ecommerce"],
    active: true
  }
];

const profilesById = new Map(businessProfiles.map((profile) => [profile.id, profile]));

export function getBusinessProfile(businessId: string): BusinessProfile | null {
  return profilesById.get(businessId) ?? null;
}

export function listActiveBusinesses(): BusinessProfile[] {
  return businessProfiles.filter((profile) => profile.active);
}

export function isKnownBusiness(businessId: string): boolean {
  return profilesById.has(businessId);
}
