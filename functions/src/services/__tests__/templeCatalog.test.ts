import { findPoojaType, listPoojaTypes } from '../templeCatalog';

describe('templeCatalog', () => {
    it('lists every pooja in catalog order', () => {
        expect(listPoojaTypes().map((pooja) => pooja.id)).toEqual([
            'pooja_ganesh',
            'pooja_lakshmi',
            'pooja_navagraha',
            'pooja_satyanarayan',
            'pooja_rudrabhishek',
            'pooja_sundarkand',
        ]);
    });

    it('returns a copy of the catalog', () => {
        listPoojaTypes().pop();

        expect(listPoojaTypes()).toHaveLength(6);
    });

    it('finds a pooja by id', () => {
        expect(findPoojaType('pooja_ganesh')).toMatchObject({
            name: 'Ganesh Puja',
            deity: 'Lord Ganesha',
            durationMinutes: 45,
            basePrice: 1100,
        });
        expect(findPoojaType('pooja_unknown')).toBeNull();
    });
});
