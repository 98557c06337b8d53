export { Logger, EventLogger } from './Logger';
export type { LinkLog, LogLevel, LogListener, LogFilter, EventLoggerOptions } from './Logger';
export {
  PhyError,
  ConfigurationError,
  ContractViolationError,
  QueueFullError,
  QueueEmptyError,
  SimulationError,
  SimulationTimeoutError,
  isPhyError,
} from './errors';
export type { PhyErrorKind } from './errors';
export {
  EthPre,
  ETH_PREAMBLE,
  FCS_LENGTH,
  XgmiiCtrl,
  BaseRCtrl,
  BaseRO,
  BaseRSync,
  BaseRBlockType,
  XGMII_TO_BASER_CTRL,
  BASER_TO_XGMII_CTRL,
  BLOCK_TYPE_TERM_LANE,
  xgmiiToBaseR,
  baseRToXgmii,
  termLaneForBlockType,
  laneCount,
  xgmiiIdlePattern,
  splitByte,
} from './constants';
export type { XgmiiCtrlName, XgmiiCtrlCode, BaseRCtrlName } from './constants';
export { crc32 } from './crc32';
export {
  LINK_DEFAULTS,
  MODE_SPEEDS,
  isLinkSpeed,
  assertSpeed,
  clockPeriodPs,
  rmiiDivider,
  assertIfg,
  resolveQueueLimits,
} from './config';
export { VALID_LINK_SPEEDS } from './types';
export type { InterfaceMode, LinkSpeed, LaneUnit, RxSample, QueueLimits, QueueStats } from './types';
