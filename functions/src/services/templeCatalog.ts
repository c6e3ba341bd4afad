import poojaData from '../data/temple/poojas.json';

export interface PoojaType {
    id: string;
    name: string;
    description: string;
    deity: string;
    durationMinutes: number;
    basePrice: number;
    iconName: string;
    benefits: string[];
    ingredients: string[];
}

const POOJAS: readonly PoojaType[] = poojaData.poojas;

export function listPoojaTypes(): PoojaType[] {
    return [...POOJAS];
}

export function findPoojaType(id: string): PoojaType | null {
    return POOJAS.find((pooja) => pooja.id === id) ?? null;
}
