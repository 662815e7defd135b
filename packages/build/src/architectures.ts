/**
 * Architecture and platform tables
 */

import {
  Architecture,
  TargetPlatform,
  PlatformDescriptor,
  BuildError,
  BuildErrorCode,
  BuildPhase
} from './types.js';

/** Every known architecture, in declaration order */
export const ALL_ARCHITECTURES: readonly Architecture[] = Object.values(Architecture);

/** Architectures built when the caller does not choose */
export const DEFAULT_ARCHITECTURES: readonly Architecture[] = [
  Architecture.ARM64,
  Architecture.ARMv7,
  Architecture.I386,
  Architecture.X86_64
];

/** Architecture whose build targets Mac Catalyst */
export const CATALYST_ARCHITECTURE = Architecture.X86_64H;

/** Architecture the toolchain is actually asked for in a Catalyst build */
export const CATALYST_BUILD_ARCHITECTURE = Architecture.X86_64;

/** Output folder suffix for Catalyst builds */
export const CATALYST_FOLDER = 'maccatalyst';

const ARCHITECTURE_PLATFORMS: Record<Architecture, TargetPlatform> = {
  [Architecture.ARM64]: TargetPlatform.Device,
  [Architecture.ARMv7]: TargetPlatform.Device,
  [Architecture.I386]: TargetPlatform.Simulator,
  [Architecture.X86_64]: TargetPlatform.Simulator,
  [Architecture.X86_64H]: TargetPlatform.Catalyst
};

/** Platform configurations */
export const PLATFORMS: Record<TargetPlatform, PlatformDescriptor> = {
  [TargetPlatform.Device]: {
    sdk: 'iphoneos',
    folder: 'iphoneos',
    // device slices embed bitcode
    cFlags: ['-fembed-bitcode']
  },
  [TargetPlatform.Simulator]: {
    sdk: 'iphonesimulator',
    folder: 'iphonesimulator',
    cFlags: []
  },
  [TargetPlatform.Catalyst]: {
    sdk: 'macosx',
    folder: CATALYST_FOLDER,
    cFlags: []
  }
};

export function platformFor(architecture: Architecture): TargetPlatform {
  return ARCHITECTURE_PLATFORMS[architecture];
}

export function extraCompilerFlags(platform: TargetPlatform): string[] {
  return [...PLATFORMS[platform].cFlags];
}

export function sdkFor(platform: TargetPlatform): string {
  return PLATFORMS[platform].sdk;
}

export function platformFolder(platform: TargetPlatform): string {
  return PLATFORMS[platform].folder;
}

export function isArchitecture(value: string): value is Architecture {
  return ALL_ARCHITECTURES.some(arch => arch === value);
}

/**
 * Parse an architecture identifier supplied by a user
 */
export function parseArchitecture(value: string): Architecture {
  const trimmed = value.trim();
  if (!isArchitecture(trimmed)) {
    throw new BuildError(
      BuildErrorCode.InvalidArchitecture,
      `'${value}' (expected one of ${ALL_ARCHITECTURES.join(', ')})`,
      BuildPhase.Configure
    );
  }
  return trimmed;
}

/**
 * Parse a comma or whitespace separated architecture list
 */
export function parseArchitectureList(value: string): Architecture[] {
  return value
    .split(/[\s,]+/)
    .filter(part => part.length > 0)
    .map(parseArchitecture);
}
