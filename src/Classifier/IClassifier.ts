import { ClassificationResult } from "./ClassificationResult";

interface IClassifier {
    classify(title: string, content: string): Promise<ClassificationResult>;
}

export default IClassifier;
