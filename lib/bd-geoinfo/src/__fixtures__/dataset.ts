import type { GeoDataset } from '../types.js';

/**
 * Small hand-made dataset with repeated names across parents
 */
export const fixtureDataset: GeoDataset = {
  divisions: [
    { id: 1, name: 'North', nameLocal: 'উত্তর' },
    { id: 2, name: 'South', nameLocal: 'দক্ষিণ' },
  ],
  districts: [
    { id: 10, divisionId: 1, name: 'Alpha', nameLocal: 'আলফা' },
    { id: 11, divisionId: 2, name: 'Beta', nameLocal: 'বেটা', upazilasCount: 1 },
    { id: 12, divisionId: 1, name: 'Gamma', nameLocal: 'গামা' },
  ],
  upazilas: [
    { id: 100, districtId: 10, name: 'Riverside', nameLocal: 'নদীতীর' },
    { id: 101, districtId: 11, name: 'Riverside', nameLocal: 'নদীতীর' },
    { id: 102, districtId: 11, name: 'Hilltop', nameLocal: 'পাহাড়চূড়া' },
  ],
  unions: [
    { id: 1000, upazilaId: 101, name: 'Ferry Ghat', nameLocal: 'খেয়াঘাট' },
    { id: 1001, upazilaId: 100, name: 'Ferry Ghat', nameLocal: 'খেয়াঘাট' },
  ],
  postcodes: [
    {
      postcode: '1234',
      name: 'Riverside Bazar',
      nameLocal: 'নদীতীর বাজার',
      upazila: 'Riverside',
      district: 'Beta',
      division: 'South',
    },
  ],
};
