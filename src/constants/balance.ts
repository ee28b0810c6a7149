// Centralized balance & tuning constants.
// Adjust these values to rebalance the game without hunting through logic files.
// Units: pixels, seconds, pixels per second.

export const SCREEN = {
    WIDTH: 960,
    HEIGHT: 540,
    GROUND_Y: 420,
};

// Player kinematics (y grows downward, 0 = feet on the ground line)
export const PLAYER_PHYSICS = {
    LANE_X: 100,
    GRAVITY: 2340,
    JUMP_VELOCITY: -750,
    DOUBLE_JUMP_VELOCITY: -600,
    JUMP_BUFFER_SECONDS: 0.12,
    DUST_INTERVAL: 0.2,
    DASH_TRAIL_INTERVAL: 0.04,
};

export const POWER_UP_VALUES = {
    DASH_DURATION: 5,
    DASH_SPEED_BONUS: 1.25,
    PICKUP_RATE_PER_SECOND: 0.18,
    PICKUP_ALTITUDE: 160,
    PICKUP_BOB_AMPLITUDE: 15,
    PICKUP_BOB_SPEED: 6,
    PICKUP_SIZE: 40,
};

// Scroll speed & difficulty curve
export const SPEED_START = 360;           // px/s at t=0
export const SPEED_MAX = 960;             // ceiling
export const SPEED_GAIN = 5.4;            // px/s gained per second survived
export const SPAWN_INTERVAL_DECAY = 0.004; // interval multiplier lost per second
export const SPAWN_INTERVAL_FLOOR = 0.45;
export const DRAGON_FREQUENCY_GAIN = 0.01; // dragon weight multiplier gained per second
export const DRAGON_FREQUENCY_CEILING = 2;

// Spawner pacing
export const SPAWN_VALUES = {
    MIN_INTERVAL: 1.1,
    MAX_INTERVAL: 2.2,
    FIRST_SPAWN_DELAY: 1,
    EARLY_DRAGON: true,      // first obstacle of a run is a dragon
    MIN_SPAWN_SPACING: 140,  // px from the last entity of any kind
    MIN_GROUND_GAP: 160,     // px between ground obstacles, floor of the reaction gap
    REACTION_WINDOW: 0.45,   // seconds of travel the player always gets between ground obstacles
    BAMBOO_COOLDOWN: 4,
    BAMBOO_MIN_DISTANCE: 300,
    CULL_MARGIN: 200,
};

export const SPAWN_WEIGHTS = {
    rock: 25,
    barrel: 20,
    bamboo: 20,
    dragon: 25,
    boulder: 10,
};

export const DRAGON_COLOR_WEIGHTS = {
    dragonRed: 5,
    dragonGreen: 4,
    dragonBlack: 1,
};

// Scroll-speed factors per entity kind
export const SPEED_FACTORS = {
    rock: 1,
    barrel: 1,
    bamboo: 1,
    boulder: 1.3,
    dragonRed: 1,
    dragonGreen: 0.95,
    dragonBlack: 1,
    blueDash: 1,
    yellowTornado: 1,
};

// Distance from the ground line to the top edge of a dragon, per altitude band
export const DRAGON_BAND_TOP = {
    low: 50,
    mid: 100,
    high: 190,
};

export const SCORE_VALUES = {
    PER_SECOND: 12,
    MILESTONE: 100,
    TORNADO_BONUS: 50,
};

export const PARTICLE_VALUES = {
    CAPACITY: 400,
    DEBRIS_GRAVITY: 1440,
    DUST_BURST: 3,
    SPARKLE_BURST: 5,
    PICKUP_BURST: 10,
    DEBRIS_BURST: 8,
};

export const ENVIRONMENT_VALUES = {
    CYCLE_SECONDS: 40,       // full day + night
    START_PHASE: 0.25,       // noon
    TOGGLE_BLEND_SECONDS: 0.75,
    PETALS_PER_SECOND: 6,
    SPARKLES_PER_SECOND: 3,
};

export const SKY_COLORS = {
    DAY: 0x87ceeb,
    NIGHT: 0x19193c,
};

// Simulation guard rails
export const MAX_FRAME_DELTA = 0.1;
