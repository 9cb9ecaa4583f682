export interface ReferenceRange {
    low_threshold?: number;
    high_threshold?: number;
    low_label?: string;
    high_label?: string;
}

export interface EventWindowRule {
    window_hours: number;
}

export interface KpiRules {
    readmission: EventWindowRule;
    reintubation: EventWindowRule;
    labs: {
        tracked_tests: string[];
        reference_ranges: Record<string, ReferenceRange>;
    };
}

export interface SectorEntry {
    id: string;
    aliases: string[];
}

export interface SectorDirectory {
    sectors: SectorEntry[];
}
