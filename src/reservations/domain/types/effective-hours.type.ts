export type HoursSource = 'special' | 'weekly' | 'none';

export type EffectiveHours =
  | {
      isOpen: false;
      source: HoursSource;
    }
  | {
      isOpen: true;
      source: Exclude<HoursSource, 'none'>;
      openTime: string;
      closeTime: string;
      lastReservationTime: string;
    };
