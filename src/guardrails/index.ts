export {
	classifyCommand,
	type DangerClassification,
	type DangerTier,
	findDeleteInvocations,
} from './classifier.js';
